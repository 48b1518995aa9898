import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, writeFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { setLogLevel } from '@tododesk/core';
import { createProgram } from '../src/program.js';

const NOW = new Date(2026, 9, 19, 12, 0, 0);

let tmpDir: string;
let file: string;

/** Run one CLI invocation against the temp task file and return what it printed */
function run(...args: string[]): string[] {
  const lines: string[] = [];
  const spy = vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
    lines.push(parts.map(String).join(' '));
  });
  try {
    createProgram({ env: { TODODESK_LOG_LEVEL: 'silent' }, now: () => NOW })
      .exitOverride()
      .parse(['--file', file, ...args], { from: 'user' });
  } finally {
    spy.mockRestore();
  }
  return lines;
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'tododesk-cli-test-'));
  file = join(tmpDir, 'tasks.json');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  setLogLevel('warn');
});

describe('add', () => {
  it('adds a task and saves it', () => {
    expect(run('add', 'Buy milk', '-D', 'tomorrow', '-c', 'personal')).toEqual([
      'Added task 1: Buy milk (due 20-10-2026)',
    ]);

    const saved: unknown = JSON.parse(readFileSync(file, 'utf8'));
    expect(saved).toEqual([{
      id: 1,
      title: 'Buy milk',
      description: '',
      category: 'Personal',
      completed: false,
      created_date: '2026-10-19',
      deadline: '20-10-2026',
      type: 'DeadlineTask',
    }]);
  });

  it('reports invalid input and saves nothing', () => {
    expect(run('add', 'Oops', '-D', '31-02-2026')).toEqual([
      "Deadline '31-02-2026' must be a valid date in DD-MM-YYYY format (e.g. 25-12-2026)",
    ]);
    expect(existsSync(file)).toBe(false);
  });

  it('uses the default category from settings', () => {
    run('config', 'set', 'defaultCategory', 'work');
    run('add', 'Standup notes', '-D', 'today');
    expect(run('list')[0]).toBe('1. (1) [ ] Urgent  Standup notes [Work]  Due: Today');
  });
});

describe('list', () => {
  beforeEach(() => {
    run('add', 'Buy milk', '-D', 'tomorrow', '-c', 'Personal');
    run('add', 'Write essay', '-D', '25-12-2026', '-c', 'School', '-d', 'history');
  });

  it('prints every task and the progress line', () => {
    expect(run('list')).toEqual([
      '1. (1) [ ] Urgent  Buy milk [Personal]  Due: Tomorrow',
      '2. (2) [ ] Pending Write essay [School]  Due: 25-12-2026\n      history',
      '',
      'Progress: 0/2 done, 2 pending (0%)',
    ]);
  });

  it('filters by text', () => {
    expect(run('ls', 'ESSAY')[0]).toBe('2. (2) [ ] Pending Write essay [School]  Due: 25-12-2026\n      history');
    expect(run('list', 'nothing')).toEqual(["No tasks match 'nothing'"]);
  });

  it('reads filter tokens with --search', () => {
    const lines = run('list', '--search', 'cat:school');
    expect(lines[0]).toBe('2. (2) [ ] Pending Write essay [School]  Due: 25-12-2026\n      history');
    expect(lines).toHaveLength(3);

    expect(run('list', '--search', 'status:urgent')[0]).toBe('1. (1) [ ] Urgent  Buy milk [Personal]  Due: Tomorrow');
  });

  it('applies the configured urgency window', () => {
    run('config', 'set', 'urgencyWindowDays', '100');
    expect(run('list', 'essay')[0]).toBe('2. (2) [ ] Urgent  Write essay [School]  Due: 25-12-2026\n      history');
  });
});

describe('empty and damaged files', () => {
  it('says when there is nothing to list', () => {
    expect(run('list')).toEqual(['No tasks saved yet... use the add command to create one']);
  });

  it('warns about an unreadable file and starts empty', () => {
    writeFileSync(file, '{not json');
    const lines = run('list');
    expect(lines[0]).toMatch(/^Could not read tasks from .*\. Starting with an empty list$/);
    expect(lines[1]).toBe('No tasks saved yet... use the add command to create one');
  });
});

describe('check', () => {
  beforeEach(() => {
    run('add', 'Buy milk', '-D', 'tomorrow');
  });

  it('toggles completion by id', () => {
    expect(run('check', '1')).toEqual(['Marked task 1 as done']);
    expect(run('check', '1')).toEqual(['Marked task 1 as pending']);
  });

  it('reports unknown and malformed ids', () => {
    expect(run('check', '9')).toEqual(['Could not find task with id 9']);
    expect(run('check', 'abc')).toEqual(["Invalid task id 'abc'. Ids are positive whole numbers"]);
  });
});

describe('edit', () => {
  beforeEach(() => {
    run('add', 'Buy milk', '-D', 'tomorrow', '-c', 'Personal');
  });

  it('updates the given fields', () => {
    expect(run('edit', '1', '--title', 'Buy oat milk', '--deadline', '25-12-2026')).toEqual(['Updated task 1']);
    expect(run('list')[0]).toBe('1. (1) [ ] Pending Buy oat milk [Personal]  Due: 25-12-2026');
  });

  it('rejects invalid changes and keeps the task', () => {
    expect(run('edit', '1', '--category', 'Errands')).toEqual([
      "Unknown category 'Errands'. Use one of: General, School, Work, Personal",
    ]);
    expect(run('list')[0]).toBe('1. (1) [ ] Urgent  Buy milk [Personal]  Due: Tomorrow');
  });

  it('needs at least one change', () => {
    expect(run('edit', '1')).toEqual(['Nothing to change. Pass --title, --description, --deadline or --category']);
  });
});

describe('delete', () => {
  beforeEach(() => {
    run('add', 'Buy milk', '-D', 'tomorrow');
  });

  it('only previews without --force', () => {
    expect(run('delete', '1')).toEqual([
      'Would delete task 1: [✗] Buy milk | Deadline: 20-10-2026',
      'Use --force to delete.',
    ]);
    expect(run('list')).toHaveLength(3);
  });

  it('deletes with --force', () => {
    expect(run('delete', '1', '--force')).toEqual(['Deleted task 1: Buy milk']);
    expect(run('list')).toEqual(['No tasks saved yet... use the add command to create one']);
  });

  it('never reuses an id in the same file', () => {
    run('add', 'Write essay', '-D', 'tomorrow');
    run('delete', '1', '-f');
    expect(run('add', 'Call home', '-D', 'tomorrow')).toEqual(['Added task 3: Call home (due 20-10-2026)']);
  });
});

describe('progress', () => {
  it('shows the share of finished tasks', () => {
    run('add', 'Buy milk', '-D', 'tomorrow');
    run('add', 'Write essay', '-D', 'tomorrow');
    run('check', '2');
    expect(run('progress')).toEqual([
      '##########---------- 50%',
      'Progress: 1/2 done, 1 pending (50%)',
    ]);
  });

  it('handles an empty list', () => {
    expect(run('progress')).toEqual(['No tasks yet']);
  });
});

describe('config', () => {
  it('prints all settings', () => {
    expect(run('config', 'get')).toEqual([
      'defaultCategory = General',
      'urgencyWindowDays = 3',
      'logLevel = warn',
      'backups = true',
    ]);
  });

  it('sets and reads one setting', () => {
    expect(run('config', 'set', 'urgencyWindowDays', '5')).toEqual(['Set urgencyWindowDays = 5']);
    expect(run('config', 'get', 'urgencyWindowDays')).toEqual(['urgencyWindowDays = 5']);
  });

  it('rejects unknown keys and bad values', () => {
    expect(run('config', 'get', 'colour')).toEqual([
      "Unknown setting 'colour'. Use one of: defaultCategory, urgencyWindowDays, logLevel, backups",
    ]);
    expect(run('config', 'set', 'backups', 'maybe')).toEqual(["backups must be true or false, got 'maybe'"]);
  });
});

describe('backup', () => {
  beforeEach(() => {
    run('add', 'Buy milk', '-D', 'tomorrow');
    // The second save backs up the file holding only the first task
    run('add', 'Write essay', '-D', 'tomorrow');
  });

  it('lists backups newest first', () => {
    expect(run('backup', 'list')).toEqual([
      'Available backups:\n',
      '   1. just now       (2026-10-19 12:00:00)',
      '   2. 12h ago        (2026-10-19 00:00:00) (daily)',
    ]);
  });

  it('asks for confirmation before restoring', () => {
    expect(run('backup', 'restore')).toEqual([
      'This will restore from backup dated 2026-10-19 12:00:00',
      'Current tasks will be backed up before restore.',
      'Use --force to skip this confirmation.',
    ]);
    expect(run('list')).toHaveLength(4);
  });

  it('restores with --force', () => {
    expect(run('backup', 'restore', '1', '--force')).toEqual([
      'Restored 1 task(s) from backup dated 2026-10-19 12:00:00',
    ]);
    expect(run('list')).toEqual([
      '1. (1) [ ] Urgent  Buy milk [General]  Due: Tomorrow',
      '',
      'Progress: 0/1 done, 1 pending (0%)',
    ]);
  });

  it('reports a backup number out of range', () => {
    expect(run('backup', 'restore', '5')).toEqual([
      "Backup #5 not found. Use 'backup list' to see available backups (1-2).",
    ]);
  });

  it('rejects a backup number that is not a positive whole number', () => {
    for (const raw of ['oops', '0', '']) {
      expect(run('backup', 'restore', raw, '--force')).toEqual([
        `Invalid backup number '${raw}'. Use a number from 'backup list'`,
      ]);
    }
    expect(run('list')).toHaveLength(4);
  });

  it('skips backups when they are turned off', () => {
    run('config', 'set', 'backups', 'false');
    run('add', 'Call home', '-D', 'tomorrow');
    expect(run('backup', 'list')).toHaveLength(3);
  });
});

describe('several task files in one folder', () => {
  function runOn(taskFile: string, ...args: string[]): string[] {
    const saved = file;
    file = join(tmpDir, taskFile);
    try {
      return run(...args);
    } finally {
      file = saved;
    }
  }

  it('keeps each file\'s backups apart', () => {
    runOn('work.json', 'add', 'Quarterly report', '-D', 'tomorrow');
    runOn('work.json', 'add', 'Team lunch', '-D', 'tomorrow');
    runOn('home.json', 'add', 'Fix the tap', '-D', 'tomorrow');
    runOn('home.json', 'add', 'Water plants', '-D', 'tomorrow');

    expect(runOn('work.json', 'backup', 'list')).toHaveLength(3);
    expect(runOn('work.json', 'backup', 'restore', '1', '--force')).toEqual([
      'Restored 1 task(s) from backup dated 2026-10-19 12:00:00',
    ]);
    expect(runOn('work.json', 'list')[0]).toBe('1. (1) [ ] Urgent  Quarterly report [General]  Due: Tomorrow');

    expect(existsSync(join(tmpDir, 'backups', 'work.daily.2026-10-19.backup.json'))).toBe(true);
    expect(existsSync(join(tmpDir, 'backups', 'home.daily.2026-10-19.backup.json'))).toBe(true);
  });
});
