/**
 * Recording Module
 */

export { ExecutionRecorder } from './ExecutionRecorder.js';
export type { ExecutionReport } from './ExecutionRecorder.js';
export { assessLearningValue, learningValuePoints } from './learningValue.js';
export type { LearningValueInput } from './learningValue.js';
