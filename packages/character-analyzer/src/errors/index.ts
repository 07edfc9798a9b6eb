export { ConfigurationError } from './configuration-error';
export { EngineError } from './engine-error';
export { NormalizationAnomalyError } from './normalization-anomaly-error';
