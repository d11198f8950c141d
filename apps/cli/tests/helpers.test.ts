import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command, InvalidArgumentError as InvalidOptionError } from 'commander';
import { createTestDb, SqliteTaskRepository, TaskService, TaskNotFoundError } from '@caseflow/core';
import { ConfigError } from '@caseflow/api';
import { parseTaskId, parseIntOption, ServiceContext, $try, $tryAsync } from '../src/helpers.js';

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('parseTaskId', () => {
  it('parses a numeric id', () => {
    expect(parseTaskId('42')).toBe(42);
    expect(parseTaskId(' 7 ')).toBe(7);
  });

  it('rejects anything else as an invalid argument', () => {
    expect(() => parseTaskId('abc')).toThrow("Invalid task id: 'abc'");
    expect(() => parseTaskId('-1')).toThrow("Invalid task id: '-1'");
  });
});

describe('parseIntOption', () => {
  it('parses signed integers', () => {
    expect(parseIntOption('3')).toBe(3);
    expect(parseIntOption('-2')).toBe(-2);
  });

  it('throws the commander error type for non-integers', () => {
    expect(() => parseIntOption('2.5')).toThrow(InvalidOptionError);
    expect(() => parseIntOption('many')).toThrow('Not an integer.');
  });
});

describe('ServiceContext', () => {
  it('opens the store once, with the --db value', () => {
    const service = new TaskService(new SqliteTaskRepository(createTestDb()));
    const open = vi.fn((_dbPath: string | undefined) => service);
    const context = new ServiceContext(open);

    const program = new Command().option('--db <path>');
    const sub = new Command('probe').action(() => {});
    program.addCommand(sub);
    program.parse(['--db', '/tmp/probe.db', 'probe'], { from: 'user' });

    expect(context.get(sub)).toBe(service);
    expect(context.get(sub)).toBe(service);
    expect(open).toHaveBeenCalledOnce();
    expect(open).toHaveBeenCalledWith('/tmp/probe.db');
  });
});

describe('$try', () => {
  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
  });

  it('prints domain errors and sets a failing exit code', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    $try(() => {
      throw TaskNotFoundError.byId(9);
    });
    expect(consoleSpy).toHaveBeenCalledWith('Task with ID 9 not found');
    expect(process.exitCode).toBe(1);
  });

  it('prints configuration errors', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    $try(() => {
      throw new ConfigError('Invalid configuration: CASEFLOW_PORT: bad');
    });
    expect(consoleSpy).toHaveBeenCalledWith('Invalid configuration: CASEFLOW_PORT: bad');
  });

  it('rethrows unexpected errors', () => {
    expect(() => $try(() => {
      throw new Error('test error');
    })).toThrow('test error');
    expect(process.exitCode).toBeUndefined();
  });
});

describe('$tryAsync', () => {
  it('handles rejected promises the same way', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await $tryAsync(async () => {
      throw TaskNotFoundError.byId(3);
    });
    expect(consoleSpy).toHaveBeenCalledWith('Task with ID 3 not found');
    await expect($tryAsync(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });
});
