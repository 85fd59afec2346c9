export {
  estimateTokens,
  type LocalAnalysis,
  type LocalAnalyzer,
  type RemoteAnalyzer,
  type RemoteResponse,
} from './types.js';
export { HeuristicAnalyzer, loadCues, type HeuristicAnalyzerOptions } from './heuristic.js';
export { HttpRemoteAnalyzer, parseRemoteResponse, type HttpRemoteAnalyzerOptions } from './http-remote.js';
