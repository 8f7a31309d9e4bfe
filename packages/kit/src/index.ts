export { parseEnv } from "./parse-env.js";
export { formatZodErrors } from "./zod-helpers.js";
export { isMainModule } from "./is-main.js";
export { isSanePrice, isSaneVolume } from "./guards.js";
export { stepDecimals, floorToStep, roundToStep } from "./round-to-step.js";
