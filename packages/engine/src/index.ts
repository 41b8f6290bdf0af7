// 引擎门面
export * from './PileupIntelligenceEngine.js';

// 定时任务
export * from './scheduling/PeriodicTask.js';

// 配置
export * from './config/config-manager.js';

// 错误处理
export * from './utils/errors/PileupError.js';
export * from './utils/ErrorBoundary.js';
