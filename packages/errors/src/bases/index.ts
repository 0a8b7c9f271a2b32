export { InternalError } from "./internal-error.js";
export { ValidationError } from "./validation-error.js";
