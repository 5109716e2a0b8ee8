import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { RateLimiter } from '../../utils/RateLimiter.js';
import type { EntityEdit } from './changeDetector.js';
import { submitEdits, type EntityEditor } from './EditSubmitter.js';

const logger = pino({ level: 'silent' });

function edit(entityId: string): EntityEdit {
  return { entityId, baseRevisionId: 1, statements: [], summary: null };
}

function recordingEditor(): EntityEditor & { edited: string[] } {
  const edited: string[] = [];
  return {
    edited,
    editEntity: async (entityEdit) => {
      edited.push(entityEdit.entityId);
    },
  };
}

describe('submitEdits', () => {
  it('submits every edit in order', async () => {
    const editor = recordingEditor();
    const count = await submitEdits([edit('Q1'), edit('Q2')], { editor, logger });

    expect(count).toBe(2);
    expect(editor.edited).toEqual(['Q1', 'Q2']);
  });

  it('submits nothing in dry-run mode', async () => {
    const editor = recordingEditor();
    const count = await submitEdits([edit('Q1')], { editor, dryRun: true, logger });

    expect(count).toBe(0);
    expect(editor.edited).toEqual([]);
  });

  it('takes a rate limiter token per edit', async () => {
    const editor = recordingEditor();
    const waits: number[] = [];
    const rateLimiter = new RateLimiter(1, 1, {
      now: () => 0,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    await submitEdits([edit('Q1'), edit('Q2'), edit('Q3')], { editor, rateLimiter, logger });

    expect(editor.edited).toEqual(['Q1', 'Q2', 'Q3']);
    expect(waits).toEqual([1000, 1000]);
  });

  it('stops at the first failed edit', async () => {
    const edited: string[] = [];
    const editor: EntityEditor = {
      editEntity: async ({ entityId }) => {
        if (entityId === 'Q2') {
          throw new Error('edit conflict');
        }
        edited.push(entityId);
      },
    };

    await expect(submitEdits([edit('Q1'), edit('Q2'), edit('Q3')], { editor, logger })).rejects.toThrow(
      'edit conflict'
    );
    expect(edited).toEqual(['Q1']);
  });
});
