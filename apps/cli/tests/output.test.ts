import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import {
  Urgency, PersistenceWriteError, createTask, toggleCompletion,
} from '@tododesk/core';
import type { TaskResult } from '@tododesk/core';
import {
  formatUrgency, formatDeadline, formatTaskLine, formatProgress,
  formatProgressBar, printResult, getTimeAgo,
} from '../src/output.js';

const NOW = new Date(2026, 9, 19, 12, 0, 0);

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatUrgency', () => {
  it('pads labels to the same width', () => {
    expect(formatUrgency(Urgency.Urgent)).toBe('Urgent ');
    expect(formatUrgency(Urgency.Pending)).toBe('Pending');
    expect(formatUrgency(Urgency.Done)).toBe('Done   ');
  });
});

describe('formatDeadline', () => {
  it('names today and tomorrow', () => {
    expect(formatDeadline('19-10-2026', false, NOW)).toBe('  Due: Today');
    expect(formatDeadline('20-10-2026', false, NOW)).toBe('  Due: Tomorrow');
  });

  it('flags overdue tasks', () => {
    expect(formatDeadline('17-10-2026', false, NOW)).toBe('  OVERDUE (2d)');
  });

  it('shows the plain date for later or completed tasks', () => {
    expect(formatDeadline('25-12-2026', false, NOW)).toBe('  Due: 25-12-2026');
    expect(formatDeadline('17-10-2026', true, NOW)).toBe('  Due: 17-10-2026');
  });

  it('handles missing or unreadable deadlines', () => {
    expect(formatDeadline('', false, NOW)).toBe('');
    expect(formatDeadline('soon', false, NOW)).toBe('  Due: soon');
  });
});

describe('formatTaskLine', () => {
  it('shows position, id, status, title, category and deadline', () => {
    const task = createTask({ title: 'Buy milk', deadline: '20-10-2026', category: 'Personal' }, 4, NOW);
    expect(formatTaskLine({ position: 0, task }, Urgency.Urgent, NOW))
      .toBe('1. (4) [ ] Urgent  Buy milk [Personal]  Due: Tomorrow');
  });

  it('puts the description on its own line', () => {
    const task = toggleCompletion(createTask(
      { title: 'Report', description: 'draft first', deadline: '01-11-2026', category: 'Work' },
      3,
      NOW,
    ));
    expect(formatTaskLine({ position: 2, task }, Urgency.Done, NOW))
      .toBe('3. (3) [x] Done    Report [Work]  Due: 01-11-2026\n      draft first');
  });
});

describe('progress', () => {
  it('summarises counts', () => {
    expect(formatProgress({ total: 4, done: 1, pending: 3, percent: 25 }))
      .toBe('Progress: 1/4 done, 3 pending (25%)');
  });

  it('draws a bar', () => {
    expect(formatProgressBar(25, 8)).toBe('##------');
    expect(formatProgressBar(0, 4)).toBe('----');
    expect(formatProgressBar(100, 4)).toBe('####');
  });
});

describe('printResult', () => {
  it('prints the message and any save problem', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const task = createTask({ title: 'Buy milk', deadline: '20-10-2026' }, 1, NOW);
    const result: TaskResult = {
      type: 'success',
      message: 'Updated task 1',
      task,
      persistError: new PersistenceWriteError('/tmp/tasks.json', 'disk full'),
    };

    printResult(result);

    expect(log.mock.calls).toEqual([
      ['Updated task 1'],
      ['Could not save tasks to /tmp/tasks.json: disk full'],
    ]);
  });

  it('prints not-found results', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResult({ type: 'not-found', message: 'Could not find task with id 9' });
    expect(log).toHaveBeenCalledWith('Could not find task with id 9');
  });
});

describe('utilities', () => {
  it('describes how long ago something happened', () => {
    expect(getTimeAgo(new Date(2026, 9, 19, 11, 59, 30), NOW)).toBe('just now');
    expect(getTimeAgo(new Date(2026, 9, 19, 11, 15), NOW)).toBe('45m ago');
    expect(getTimeAgo(new Date(2026, 9, 19, 0, 0), NOW)).toBe('12h ago');
    expect(getTimeAgo(new Date(2026, 9, 16, 12, 0), NOW)).toBe('3d ago');
  });
});
