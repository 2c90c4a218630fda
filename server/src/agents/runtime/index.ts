/**
 * Orchestration Runtime: Public API
 */

export { SharedContextStore, storageKey, type ContextReader, type ContextWrite } from './context-store.js';
export { CollaboratorRegistry } from './agent-registry.js';
export { TurnExecutor, type TurnExecutorOptions, type TurnRequest } from './turn-executor.js';
export { decide, type RouterDecision, type RouterInput } from './router.js';
export {
  RevisionCycleManager,
  isFrozen,
  type ExampleStatus,
  type ExampleProgress,
  type StatusChange,
  type StatusReason,
  type BackwardTarget,
  type RevisionAdvisor,
} from './revision-manager.js';
export * from './errors.js';
export {
  WORKFLOW_STAGES,
  type WorkflowStage,
  type Capability,
  type CollaboratorDescriptor,
  type ExampleSlot,
  type GenerationBackend,
  type GenerationRequest,
  type TurnRecord,
  type TurnView,
} from './agent-protocol.js';
