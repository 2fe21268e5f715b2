import type { ConstructorDescriptor, MethodDescriptor, TypeDescriptor } from "../descriptors.js";

/**
 * Observes methods and constructors as types are built.
 * Called synchronously once per descriptor; has no effect on the graph.
 */
export interface TypeAnalysisListener {
  onMethodFound(method: MethodDescriptor, type: TypeDescriptor): void;
  onConstructorFound(constructor: ConstructorDescriptor, type: TypeDescriptor): void;
}

export const NO_OP_LISTENER: TypeAnalysisListener = {
  onMethodFound: () => undefined,
  onConstructorFound: () => undefined,
};
