import { describe, it, expect } from 'vitest';
import { captureBuildCommand } from './profile';

describe('captureBuildCommand', () => {
  const argv = (...args: string[]) => ['node', 'buildprof', ...args];

  it('joins everything after -b into one value', () => {
    expect(captureBuildCommand(argv('profile', '.', '-b', 'make', '-j4', 'all'))).toEqual(
      argv('profile', '.', '-b', 'make -j4 all'),
    );
  });

  it('treats a trailing directory as part of the command', () => {
    expect(captureBuildCommand(argv('profile', '--build', 'make', 'src'))).toEqual(
      argv('profile', '--build', 'make src'),
    );
  });

  it('drops a separator right after the flag', () => {
    expect(captureBuildCommand(argv('--json', 'profile', '-b', '--', 'ninja', '-C', 'out'))).toEqual(
      argv('--json', 'profile', '-b', 'ninja -C out'),
    );
  });

  it('leaves a single quoted command alone', () => {
    const args = argv('profile', '-o', 'r.csv', '-b', 'make -j4');
    expect(captureBuildCommand(args)).toEqual(args);
  });

  it('ignores -b on other commands and a flag with no command', () => {
    const compare = argv('compare', 'a.json', 'b.json', '-b', 'x');
    const bare = argv('profile', '.', '-b');
    expect(captureBuildCommand(compare)).toEqual(compare);
    expect(captureBuildCommand(bare)).toEqual(bare);
  });
});
