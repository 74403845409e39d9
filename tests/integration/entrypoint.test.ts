import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { run } = vi.hoisted(() => ({ run: vi.fn() }));

vi.mock('../../src/application/services/dataset-pipeline.service.js', () => ({
  DatasetPipeline: class {
    run = run;
  },
}));

type Listener = (value: unknown) => void;

describe('Entry point', () => {
  const listeners = new Map<string, Listener>();

  beforeEach(() => {
    vi.resetModules();
    listeners.clear();
    process.exitCode = undefined;

    vi.spyOn(process, 'on').mockImplementation((event: string | symbol, listener: Listener) => {
      listeners.set(String(event), listener);
      return process;
    });
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit must not be called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should set exit code 0 after a successful run without forcing an exit', async () => {
    run.mockResolvedValue([]);

    await import('../../src/index.js');

    await vi.waitFor(() => expect(process.exitCode).toBe(0));
    expect(run).toHaveBeenCalledTimes(1);
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should set exit code 1 after a failed run without forcing an exit', async () => {
    run.mockRejectedValue(new Error('upload failed'));

    await import('../../src/index.js');

    await vi.waitFor(() => expect(process.exitCode).toBe(1));
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should flag stray errors with exit code 1 and let the process drain', async () => {
    run.mockReturnValue(new Promise<unknown[]>(() => undefined));

    await import('../../src/index.js');

    listeners.get('unhandledRejection')?.(new Error('stray'));
    expect(process.exitCode).toBe(1);

    process.exitCode = undefined;
    listeners.get('uncaughtException')?.(new Error('thrown'));
    expect(process.exitCode).toBe(1);
    expect(process.exit).not.toHaveBeenCalled();
  });
});
