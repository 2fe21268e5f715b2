export type { ImportContext, UnresolvedReference } from "./ImportContext.js";
export { type TypeAnalysisListener, NO_OP_LISTENER } from "./TypeAnalysisListener.js";
