export * from './types.js';
export {
  ActionPlanner,
  INTENT_NAMES,
  extractCode,
  extractPath,
  isIntentName,
  type Intent,
  type IntentName,
} from './action-planner.js';
export { IntentRouter, parseRoute } from './intent-router.js';
export { ModeStage } from './mode-stage.js';
export { ResearchStage } from './research-stage.js';
export { ReasoningStage } from './reasoning-stage.js';
export { WorldModelStage } from './world-model-stage.js';
export { CodeStage } from './code-stage.js';
export { CriticStage } from './critic-stage.js';
