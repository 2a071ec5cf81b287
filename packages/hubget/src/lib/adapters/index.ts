export { systemClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createNodeFetchTransport } from "./node-fetch-transport.js";
