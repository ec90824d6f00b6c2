import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({ spawn: spawnMock }));

import { DetachedProcessLauncher, workerEntry } from '../src/launcher.js';

const cliSource = join(dirname(fileURLToPath(import.meta.url)), '..', 'src', 'index.ts');

class FakeChild extends EventEmitter {
  unref = vi.fn();
  constructor(readonly pid: number | undefined) {
    super();
  }
}

describe('DetachedProcessLauncher', () => {
  beforeEach(() => {
    spawnMock.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should start the refresh command detached and return its pid', () => {
    const child = new FakeChild(31337);
    spawnMock.mockReturnValue(child);

    const pid = new DetachedProcessLauncher('/opt/statusquota/cli.js').launch();

    expect(pid).toBe(31337);
    expect(child.unref).toHaveBeenCalledTimes(1);
    expect(spawnMock).toHaveBeenCalledWith(
      process.execPath,
      [...process.execArgv, '/opt/statusquota/cli.js', 'refresh'],
      expect.objectContaining({ detached: true, stdio: 'ignore' })
    );
  });

  it('should report a spawn without a pid as a failure', () => {
    const child = new FakeChild(undefined);
    spawnMock.mockReturnValue(child);

    expect(new DetachedProcessLauncher('/opt/statusquota/cli.js').launch()).toBeUndefined();
    expect(() => child.emit('error', new Error('spawn ENOENT'))).not.toThrow();
  });

  it('should report a throwing spawn as a failure', () => {
    spawnMock.mockImplementation(() => {
      throw new Error('EAGAIN');
    });

    expect(new DetachedProcessLauncher('/opt/statusquota/cli.js').launch()).toBeUndefined();
  });

  it('should launch this package\'s CLI rather than the host script by default', () => {
    const child = new FakeChild(31338);
    spawnMock.mockReturnValue(child);

    expect(new DetachedProcessLauncher().launch()).toBe(31338);
    expect(spawnMock).toHaveBeenCalledWith(
      process.execPath,
      [...process.execArgv, cliSource, 'refresh'],
      expect.objectContaining({ detached: true })
    );
  });
});

describe('workerEntry', () => {
  it('should point at the CLI module beside the launcher', () => {
    expect(workerEntry()).toBe(cliSource);
  });
});
