// ─── JSON Todo Lists → Block ────────────────────────────────────────────────

import { z } from 'zod';
import type { Block, Parser } from '../types.js';
import { createBlock } from '../blocks.js';

const todoSchema = z.object({
  content: z.string().catch(''),
  status: z.string().catch('pending'),
  activeForm: z.string().optional(),
});

const todoListSchema = z.array(todoSchema).nonempty();

export type TodoItem = z.infer<typeof todoSchema>;

const STATUS_MARK: Record<string, string> = {
  completed: '✓',
  in_progress: '→',
};

export class TodoParser implements Parser {
  detect(filePath: string): boolean {
    return filePath.toLowerCase().endsWith('.json');
  }

  /** A non-empty JSON array of todos becomes one block; anything else none. */
  parse(content: string): Block[] {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return [];
    }

    const result = todoListSchema.safeParse(raw);
    if (!result.success) return [];

    const todos = result.data;
    const done = todos.filter((t) => t.status === 'completed').length;

    const lines = [
      `todos (${done}/${todos.length} completed)`,
      '',
      ...todos.map((t) => `${STATUS_MARK[t.status] ?? '○'} ${t.content}`),
    ];
    const text = lines.join('\n') + '\n';

    return [
      createBlock({
        name: `todos ${done}/${todos.length}`,
        content: text,
        pages: [{ kind: 'lines', text }],
        sourceKind: 'other',
      }),
    ];
  }
}
