export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionOutcome } from "./ingestion-pipeline.js";
export { IngestionStateMachine } from "./ingestion-state.js";
export type { StateChangeListener } from "./ingestion-state.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { answer } from "./answer-pipeline.js";
export type { AnswerDependencies } from "./answer-pipeline.js";

export { assembleContext } from "./context-assembler.js";
export { renderPrompt, validatePromptTemplate } from "./prompt.js";
export type { PromptVariables } from "./prompt.js";
