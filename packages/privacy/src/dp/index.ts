export {
  DifferentialPrivacyEngine,
  histogramCounts,
  queryFingerprint,
  type DPEngineOptions,
  type DPQuery,
  type CountQuery,
  type SumQuery,
  type MeanQuery,
  type HistogramQuery,
  type HistogramBins,
  type HistogramBin,
  type QueryResult,
  type PublishableResult,
  type Mechanism,
  type DataRecord,
  type RecordFilter,
  type ExecuteOptions,
} from './engine.js';
export { PrivacyBudget, type PrivacyBudgetOptions, type BudgetLedger } from './budget.js';
export { SeededRandom } from './random.js';
