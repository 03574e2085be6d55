/**
 * `mindgate run "request"` — runs one request through the pipeline.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { EventBus } from '../../core/events.js';
import { createLogger, setLogger } from '../../core/logger.js';
import type { MindgateConfigInput } from '../../core/types.js';
import { ReplayEntropySource } from '../../entropy/entropy-source.js';
import { createDefaultExecutor } from '../../execution/index.js';
import { WikipediaKnowledgeService } from '../../knowledge/index.js';
import { createLessonStore } from '../../memory/index.js';
import { createPipeline, RunRegistry } from '../../pipeline/index.js';
import { createProvider } from '../../providers/index.js';
import { formatEntry, formatReport } from '../format.js';
import { VERSION } from '../../version.js';

interface RunCommandOptions {
  dir: string;
  json?: boolean;
  seed?: number;
  entropy?: string;
  maxAttempts?: number;
  timeout?: number;
  offline?: boolean;
  /** Path to the lesson database, or false for --no-memory. */
  memory?: string | boolean;
  verbose?: boolean;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a request through the gated reasoning pipeline')
    .argument('<request...>', 'The request to handle')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output the run report as JSON')
    .option('--seed <n>', 'Seed the entropy source for a reproducible mode', parseInteger)
    .option('--entropy <bits>', 'Replay a fixed bit pattern, e.g. 1111 forces chaos')
    .option('--max-attempts <n>', 'Attempt ceiling shared by rejections and critic fails', parseInteger)
    .option('--timeout <ms>', 'Per-stage timeout in milliseconds', parseInteger)
    .option('--offline', 'Run without the language model and knowledge lookups')
    .option('--memory <path>', 'Lesson database path')
    .option('--no-memory', 'Neither recall nor store lessons')
    .option('-v, --verbose', 'Pretty-print logs to stderr')
    .action(async (requestParts: string[], options: RunCommandOptions) => {
      await executeRun(requestParts.join(' '), options);
    });

  return cmd;
}

async function executeRun(request: string, options: RunCommandOptions): Promise<void> {
  const configManager = new ConfigManager({ projectDir: resolve(options.dir) });
  const overrides: MindgateConfigInput = {
    pipeline: {
      ...(options.maxAttempts !== undefined ? { maxAttempts: options.maxAttempts } : {}),
      ...(options.timeout !== undefined ? { stageTimeoutMs: options.timeout } : {}),
    },
    entropy: options.seed !== undefined ? { source: 'seeded', seed: options.seed } : {},
    memory: {
      ...(options.memory === false ? { enabled: false } : {}),
      ...(typeof options.memory === 'string' ? { path: resolve(options.memory) } : {}),
    },
    llm: options.offline ? { provider: 'none' } : {},
  };
  const config = configManager.load(overrides);
  configManager.ensureDirectories();
  setLogger(createLogger('mindgate', options.verbose ?? config.ui.verbose));
  const json = options.json ?? config.ui.json;

  const events = new EventBus();
  const memory = createLessonStore(config.memory, configManager.getDefaultMemoryPath());
  const pipeline = createPipeline(config, {
    llm: createProvider(config.llm),
    knowledge: options.offline ? null : new WikipediaKnowledgeService(),
    memory,
    executor: createDefaultExecutor(),
    entropy: options.entropy ? new ReplayEntropySource([options.entropy]) : undefined,
    events,
  });
  const registry = new RunRegistry(pipeline, events);

  if (!json) {
    console.log();
    console.log(`🧠 Mindgate v${VERSION}`);
    console.log();
  }

  const runId = registry.submit(request);
  const onSigint = (): void => {
    registry.cancel(runId);
  };
  process.once('SIGINT', onSigint);

  try {
    if (!json) {
      for await (const event of registry.stream(runId)) {
        if (event.type === 'stage') console.log(formatEntry(event.entry));
        if (event.type === 'retry') console.log(`  ↻ retry ${event.retryCount}: ${event.reason}`);
      }
    }

    const report = await registry.wait(runId);
    console.log(json ? JSON.stringify(report, null, 2) : `\n${formatReport(report)}\n`);

    if (report.status === 'failure') {
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onSigint);
    registry.dispose();
    await memory?.close();
  }
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}
