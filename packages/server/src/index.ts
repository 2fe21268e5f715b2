/**
 * @typegraph/server
 * MCP tools over an imported type graph.
 */

export {
  NOT_LOADED,
  TypeGraphService,
  type DependencyDirection,
  type DependencyScope,
  type LoadedGraph,
  type TypeHierarchy,
} from "./TypeGraphService.js";
export {
  bulletList,
  formatCycles,
  formatDependencies,
  formatHierarchy,
  formatLoaded,
  formatMember,
  formatType,
  MAX_LIST_ITEMS,
} from "./format.js";
export { registerAllTools, type Services } from "./tools/index.js";
