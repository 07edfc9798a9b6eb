export {
  BatchOrchestrator,
  type BatchOrchestratorOptions,
  type OrchestratorRunOptions,
} from './batch-orchestrator';
