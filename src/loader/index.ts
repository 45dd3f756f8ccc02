export type {
	JsonLinesResult,
	LineError,
	PredictionLoadResult,
} from "./prediction-loader";
export { loadPredictions, parseJsonLines } from "./prediction-loader";
