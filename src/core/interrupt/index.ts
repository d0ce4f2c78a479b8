export { InterruptHandler } from './handler.js';
export type { InterruptHandlerOptions, InterruptSource } from './handler.js';
