export {
  generateRationale,
  formatRationale,
  riskLabel,
  NO_RISK_FACTORS_SUMMARY,
  type Rationale,
} from './generateRationale.js';
