// Decode / Spot Schema
export * from './schema/decode.schema.js';

// Message Schema
export * from './schema/message.schema.js';

// Session Schema
export * from './schema/session.schema.js';

// Prediction Schema
export * from './schema/prediction.schema.js';

// Spectrum Schema
export * from './schema/spectrum.schema.js';

// Config Schema
export * from './schema/config.schema.js';

// Engine Schema（事件与洞察）
export * from './schema/engine.schema.js';
