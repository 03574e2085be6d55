import { z } from 'zod';
import type { HistoryEntry } from '../stages/types.js';
import type { RunReport } from '../pipeline/types.js';
import type { Lesson } from '../memory/types.js';

// ===== Configuration =====

const ToleranceSchema = z.object({
  logic: z.number().min(0).max(1).default(0.4),
  balanced: z.number().min(0).max(1).default(0.55),
  chaos: z.number().min(0).max(1).default(0.7),
}).default({});

export const MindgateConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(['ollama', 'none']).default('none'),
    baseUrl: z.string().default('http://localhost:11434'),
    model: z.string().default('llama3.1'),
    maxRetries: z.number().int().min(0).max(10).default(2),
  }).default({}),
  entropy: z.object({
    source: z.enum(['crypto', 'seeded']).default('crypto'),
    bits: z.number().int().min(1).max(4096).default(16),
    bias: z.number().min(0).max(1).default(0.5),
    seed: z.number().int().optional(),
  }).default({}),
  mode: z.object({
    /** Fraction of set bits at or above which a run is drawn in chaos mode. */
    chaosThreshold: z.number().min(0).max(1).default(0.5),
    /** Optional lower band; fractions in [balancedThreshold, chaosThreshold) draw balanced mode. */
    balancedThreshold: z.number().min(0).max(1).optional(),
  }).default({}),
  simulation: z.object({
    tolerance: ToleranceSchema,
    safetyCeiling: z.number().min(0).max(1).default(0.8),
    weights: z.object({
      irreversibility: z.number().min(0).default(0.45),
      blastRadius: z.number().min(0).default(0.35),
      resourceCost: z.number().min(0).default(0.2),
    }).default({}),
    lessonPenalty: z.number().min(0).max(1).default(0.1),
    maxLessonPenalty: z.number().min(0).max(1).default(0.3),
  }).default({}),
  pipeline: z.object({
    /** Reasoning attempts per run, first try included; rejections and critic fails share them. */
    maxAttempts: z.number().int().min(1).max(10).default(3),
    stageTimeoutMs: z.number().int().min(1).default(30_000),
    maxFacts: z.number().int().min(0).max(50).default(5),
    maxVariants: z.number().int().min(1).max(20).default(5),
  }).default({}),
  memory: z.object({
    enabled: z.boolean().default(true),
    store: z.enum(['sqlite', 'memory']).default('sqlite'),
    path: z.string().optional(),
    maxLessons: z.number().int().min(0).max(50).default(3),
    minRelevance: z.number().min(0).max(1).default(0.2),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
    json: z.boolean().default(false),
  }).default({}),
}).superRefine((config, ctx) => {
  const { logic, balanced, chaos } = config.simulation.tolerance;
  if (!(logic <= balanced && balanced <= chaos)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['simulation', 'tolerance'],
      message: `tolerances must satisfy logic <= balanced <= chaos (got ${logic}, ${balanced}, ${chaos})`,
    });
  }
  const weights = config.simulation.weights;
  if (weights.irreversibility + weights.blastRadius + weights.resourceCost <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['simulation', 'weights'],
      message: 'at least one risk weight must be positive',
    });
  }
  const { balancedThreshold, chaosThreshold } = config.mode;
  if (balancedThreshold !== undefined && balancedThreshold >= chaosThreshold) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['mode', 'balancedThreshold'],
      message: 'balancedThreshold must be below chaosThreshold',
    });
  }
});

export type MindgateConfig = z.infer<typeof MindgateConfigSchema>;

/** Input shape accepted by the config loader (every field optional). */
export type MindgateConfigInput = z.input<typeof MindgateConfigSchema>;

export type SimulationConfig = MindgateConfig['simulation'];
export type PipelineConfig = MindgateConfig['pipeline'];

// ===== Modes =====

export const MODES = ['logic', 'balanced', 'chaos'] as const;

export type Mode = typeof MODES[number];

// ===== Run lifecycle =====

export type RunState =
  | 'started'
  | 'researching'
  | 'reasoning'
  | 'simulating'
  | 'rejected'
  | 'accepted'
  | 'executing'
  | 'critiquing'
  | 'terminated-success'
  | 'terminated-failure'
  | 'cancelled';

export type TerminalState = Extract<RunState, 'terminated-success' | 'terminated-failure' | 'cancelled'>;

export type RunStatus = 'success' | 'failure' | 'cancelled';

export type TerminationReason =
  | 'completed'
  | 'max-retries-exceeded'
  | 'simulation-gate-violation'
  | 'stage-timeout'
  | 'stage-error'
  | 'no-alternative-action'
  | 'cancelled'
  | (string & {});

// ===== Diagnostics =====

export type DiagnosticSeverity = 'info' | 'degraded' | 'soft-fail' | 'hard-fail' | 'safety-rejection';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: string;
  message: string;
  stage?: string;
}

// ===== Events =====

export interface MindgateEvents {
  'run:start': { runId: string; request: string };
  'run:mode': { runId: string; mode: Mode; score: number; degraded: boolean };
  'state:change': { runId: string; from: RunState; to: RunState };
  'stage:start': { runId: string; stage: string; attempt: number };
  'stage:complete': { runId: string; entry: HistoryEntry };
  'run:retry': { runId: string; retryCount: number; reason: string };
  'run:complete': { report: RunReport };
  'lesson:stored': { runId: string; lesson: Lesson };
}
