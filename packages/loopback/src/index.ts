export { LoopbackAgent } from './LoopbackAgent.js';
export type { LoopbackAgentOptions } from './LoopbackAgent.js';
export { SendBuffer } from './SendBuffer.js';
