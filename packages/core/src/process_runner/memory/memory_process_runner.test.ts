import { MemoryProcessRunner, ok, fail } from './memory_process_runner';

describe('MemoryProcessRunner', () => {
  let runner: MemoryProcessRunner;

  beforeEach(() => {
    runner = new MemoryProcessRunner();
  });

  it('should answer by command and argument prefix', async () => {
    runner.on('git', ['describe'], ok('v1.0.0\n'));

    expect(await runner.execCommand('git', ['describe', '--tags'])).toEqual(ok('v1.0.0\n'));
  });

  it('should prefer the most recently added rule', async () => {
    runner.on('git', ['clone'], ok());
    runner.on('git', ['clone', '--depth=1', '--bare', 'git@h:o/n'], fail('denied'));

    expect((await runner.execCommand('git', ['clone', '--depth=1', '--bare', 'git@h:o/n', 'repo'])).exitCode).toBe(128);
    expect((await runner.execCommand('git', ['clone', '--depth=1', '--bare', 'https://h/o/n', 'repo'])).exitCode).toBe(0);
  });

  it('should consume once rules after a single match', async () => {
    runner.on('git', ['log'], ok('second'));
    runner.once('git', ['log'], ok('first'));

    expect((await runner.execCommand('git', ['log'])).stdout).toBe('first');
    expect((await runner.execCommand('git', ['log'])).stdout).toBe('second');
  });

  it('should fail unscripted commands with exit code 1', async () => {
    const result = await runner.execCommand('git', ['fsck']);

    expect(result).toEqual({ exitCode: 1, stdout: '', stderr: 'unscripted command: git fsck' });
  });

  it('should record calls and forget them on clear', async () => {
    await runner.execCommand('git', ['status'], { cwd: '/w' });

    expect(runner.getCalls()).toEqual([{ command: 'git', args: ['status'], options: { cwd: '/w' } }]);

    runner.clear();
    expect(runner.getCalls()).toEqual([]);
  });
});
