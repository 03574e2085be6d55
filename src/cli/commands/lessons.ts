/**
 * `mindgate lessons [query]` — list stored lessons, or rank them against a query.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import type { MindgateConfig } from '../../core/types.js';
import type { LessonStore } from '../../memory/types.js';
import { createLessonStore } from '../../memory/index.js';
import { formatLesson } from '../format.js';

interface LessonsCommandOptions {
  dir: string;
  memory?: string;
  limit: string;
  json?: boolean;
}

export function createLessonsCommand(): Command {
  const cmd = new Command('lessons');

  cmd
    .description('Show lessons learned from past runs')
    .argument('[query]', 'Action pattern or free text to rank lessons against')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--memory <path>', 'SQLite lesson database to read')
    .option('-n, --limit <count>', 'Max results when querying', '5')
    .option('--json', 'Output as JSON')
    .action(async (query: string | undefined, options: LessonsCommandOptions) => {
      await showLessons(query, options);
    });

  return cmd;
}

async function showLessons(query: string | undefined, options: LessonsCommandOptions): Promise<void> {
  const configManager = new ConfigManager({ projectDir: resolve(options.dir) });
  const config = configManager.load();
  const memoryConfig: MindgateConfig['memory'] = options.memory
    ? { ...config.memory, store: 'sqlite', path: resolve(options.memory) }
    : config.memory;

  const store = createLessonStore(memoryConfig, configManager.getDefaultMemoryPath());
  try {
    console.log(await renderLessons(query, {
      store,
      storeKind: memoryConfig.store,
      limit: Number.parseInt(options.limit, 10) || 5,
      json: options.json,
    }));
  } finally {
    await store?.close();
  }
}

export interface LessonsView {
  /** Null when memory is disabled. */
  store: LessonStore | null;
  storeKind: MindgateConfig['memory']['store'];
  limit: number;
  json?: boolean;
}

export async function renderLessons(query: string | undefined, view: LessonsView): Promise<string> {
  const { store } = view;
  if (!store) {
    return view.json ? '[]' : 'Lesson memory is disabled (memory.enabled is false).';
  }

  const lessons = query ? await store.query(query, { limit: view.limit }) : await store.list();
  if (view.json) {
    return JSON.stringify(lessons, null, 2);
  }
  if (lessons.length === 0) {
    if (view.storeKind === 'memory') {
      return 'The in-memory lesson store only holds lessons from the current process; set memory.store to sqlite to keep them.';
    }
    return query ? `No lessons match "${query}".` : 'No lessons stored yet.';
  }
  return lessons.map(formatLesson).join('\n\n');
}
