import { setImmediate as nextTick } from 'node:timers/promises';

export type UnhandledCapture = {
  reasons: unknown[];
  /** Resolves after pending rejections have had a chance to surface. */
  settle: () => Promise<unknown[]>;
  restore: () => void;
};

export function captureUnhandledRejections(): UnhandledCapture {
  const reasons: unknown[] = [];
  const listener = (reason: unknown) => {
    reasons.push(reason);
  };

  process.on('unhandledRejection', listener);

  return {
    reasons,
    async settle() {
      await nextTick();
      await nextTick();
      return [...reasons];
    },
    restore() {
      process.off('unhandledRejection', listener);
    }
  };
}
