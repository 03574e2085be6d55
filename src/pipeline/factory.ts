import type { MindgateConfig } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import type { EntropySource } from '../entropy/types.js';
import type { ActionExecutor } from '../execution/types.js';
import type { KnowledgeService } from '../knowledge/types.js';
import type { LessonStore } from '../memory/types.js';
import type { LLMProvider } from '../providers/types.js';
import { createEntropySource } from '../entropy/entropy-source.js';
import { ModeSelector } from '../entropy/mode-selector.js';
import { ConsequenceSimulator } from '../simulation/consequence-simulator.js';
import { ReflectionEngine } from '../reflection/reflection-engine.js';
import {
  ActionPlanner,
  CodeStage,
  IntentRouter,
  CriticStage,
  ModeStage,
  ReasoningStage,
  ResearchStage,
  WorldModelStage,
} from '../stages/index.js';
import { PipelineOrchestrator } from './orchestrator.js';

export interface PipelineCollaborators {
  llm?: LLMProvider | null;
  knowledge?: KnowledgeService | null;
  memory?: LessonStore | null;
  executor?: ActionExecutor | null;
  /** Overrides the configured entropy source, e.g. to replay a bit pattern. */
  entropy?: EntropySource;
  events?: EventBus;
}

/**
 * Wire the six stages, the simulator and reflection from configuration and
 * explicit collaborator handles.
 */
export function createPipeline(config: MindgateConfig, collaborators: PipelineCollaborators = {}): PipelineOrchestrator {
  const llm = collaborators.llm ?? null;
  const memory = collaborators.memory ?? null;
  const entropy = collaborators.entropy ?? createEntropySource(config.entropy);
  const selector = new ModeSelector({
    chaosThreshold: config.mode.chaosThreshold,
    balancedThreshold: config.mode.balancedThreshold,
  });

  const planner = new ActionPlanner(config.pipeline.maxVariants);

  return new PipelineOrchestrator({
    stages: {
      mode: new ModeStage(entropy, selector),
      research: new ResearchStage(collaborators.knowledge ?? null, config.pipeline.maxFacts),
      reasoning: new ReasoningStage(planner, llm, llm ? new IntentRouter(planner, llm) : null),
      worldModel: new WorldModelStage(new ConsequenceSimulator(config.simulation), memory),
      code: new CodeStage(collaborators.executor ?? null, llm),
      critic: new CriticStage(llm),
    },
    maxAttempts: config.pipeline.maxAttempts,
    stageTimeoutMs: config.pipeline.stageTimeoutMs,
    maxLessons: config.memory.maxLessons,
    memory,
    reflection: new ReflectionEngine({ store: memory, llm }),
    events: collaborators.events,
  });
}
