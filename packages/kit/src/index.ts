export { assertPositive, assertPositiveInt } from "./assert-positive.js";
export { isMainModule } from "./is-main.js";
export { parseEnv } from "./parse-env.js";
export { formatZodErrors } from "./zod-helpers.js";
