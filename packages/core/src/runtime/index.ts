/**
 * Runtime exports
 */

export { execute, Interpreter, type ExecuteOptions, type InterpreterOptions } from "./interpreter.js";
export { Environment, type FrameId } from "./environment.js";
export { evaluateBinary, evaluateUnary } from "./operators.js";
export {
  MapFunctionRegistry,
  maxArity,
  type CallContext,
  type FunctionDescriptor,
  type FunctionRegistry,
} from "./registry.js";
export { TraceLog, createRunId, type TraceEntry, type TraceEvent } from "./trace.js";
export {
  isCallable,
  isFunctionValue,
  type Callable,
  type FunctionArgument,
  type FunctionValue,
  type RuntimeValue,
} from "./values.js";
