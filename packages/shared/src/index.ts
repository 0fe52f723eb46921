export type * from './types/agent.js';
export type * from './types/config.js';
export type * from './types/model.js';
export type * from './types/session.js';
export type * from './types/tool.js';
export type * from './types/trace.js';
export type * from './types/turn.js';

export * from './schemas/agent.schema.js';
export * from './schemas/config.schema.js';
export * from './schemas/model.schema.js';
export * from './schemas/session.schema.js';

export * from './constants.js';
export * from './utils/index.js';
