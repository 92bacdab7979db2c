/**
 * Standard function library
 */

import { MapFunctionRegistry } from "../runtime/registry.js";
import { arrayFunctions } from "./array.js";
import { mathFunctions } from "./math.js";
import { objectFunctions } from "./object.js";
import { stringFunctions } from "./string.js";
import { typeFunctions } from "./type.js";

export { arrayFunctions, mathFunctions, objectFunctions, stringFunctions, typeFunctions };

/** Registry holding every standard function */
export function createStandardRegistry(): MapFunctionRegistry {
  return new MapFunctionRegistry([
    ...arrayFunctions,
    ...stringFunctions,
    ...mathFunctions,
    ...objectFunctions,
    ...typeFunctions,
  ]);
}
