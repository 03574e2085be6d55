export { ReflectionEngine, findFailedAttempt, type FailedAttempt, type ReflectionEngineOptions } from './reflection-engine.js';
