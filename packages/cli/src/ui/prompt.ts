import inquirer from 'inquirer';
import type { BuildWaiter } from '@buildprof/core';
import { InterruptedError } from '@buildprof/shared';

export const BUILD_PROMPT = 'Press Enter to continue after build...';

/**
 * Holds the profiling run until the user has run their build by hand.
 * Everything goes to stderr so stdout only carries the command's result.
 */
export class ConsoleBuildWaiter implements BuildWaiter {
  async waitForBuild(root: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new InterruptedError('Build step was interrupted');
    }

    console.error(`\nRun your build in ${root} now.`);
    const prompt = inquirer.createPromptModule({ output: process.stderr });
    const answered = prompt<{ done: string }>([
      {
        type: 'input',
        name: 'done',
        message: BUILD_PROMPT,
      },
    ]);
    if (!signal) {
      await answered;
      return;
    }

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => {
        answered.ui.close();
        reject(new InterruptedError('Build step was interrupted'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      await Promise.race([answered, aborted]);
    } finally {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }
}
