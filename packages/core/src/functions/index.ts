export {
  acceptsArity,
  describeArity,
  FunctionRegistry,
  type FunctionDescriptor,
} from './registry.js';
export { createStandardRegistry, STANDARD_FUNCTIONS } from './standard.js';
