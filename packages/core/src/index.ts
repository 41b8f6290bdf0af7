export * from './parser/pileup-message-parser.js';

// 时钟系统导出
export * from './clock/ClockSource.js';
export * from './clock/ClockSourceSystem.js';
export * from './clock/ClockSourceMock.js';

// 频谱占用图
export * from './spectrum/SpectralOccupancyMap.js';

// 会话跟踪
export * from './session/TargetSession.js';
export * from './session/SessionTracker.js';
export * from './session/MultiTargetTracker.js';

// 挑选风格分析
export * from './pattern/PatternAnalyzer.js';

// 预测器导出
export * from './predictor/shared.js';
export * from './predictor/PredictionCache.js';
export * from './predictor/BayesianPredictor.js';
export * from './predictor/HeuristicPredictor.js';
