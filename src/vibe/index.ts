// ============================================================
// Vibe Studio - Vibe Core
// Public API surface for the vibe request pipeline
// ============================================================

// ---- Prompt builder ----
export { buildVibePrompt, buildUserPrompt, SYSTEM_INSTRUCTION, VIBE_FIELDS } from './prompt';
export type { VibePrompt } from './prompt';

// ---- Generation client ----
export { generateRaw, createGenerator, isProviderId, PROVIDER_IDS } from './providers';

// ---- Response validator ----
export { parseVibeResponse, VibeResponseSchema } from './parser';

// ---- Failures & classifier ----
export {
  GenerationFailure,
  SchemaFailure,
  VibeInputError,
  classifyFailure,
  describeFailure,
  checkDescription,
  toFailure,
} from './errors';
export type { VibeFailure, SchemaFailureReason } from './errors';

// ---- Orchestrator ----
export { VibeOrchestrator, createVibeRequest } from './orchestrator';
export type { VibeOrchestratorConfig } from './orchestrator';
