import type { TranslationLogger } from '@/types/translation';

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Turns SIGINT/SIGTERM into an abort on `controller`. Returns a disposer that
 * removes the listeners again.
 */
export function installInterruptHandler(
  controller: AbortController,
  opts: { logger?: TranslationLogger; target?: SignalSource } = {}
): () => void {
  const logger = opts.logger ?? console;
  const target: SignalSource = opts.target ?? process;

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      return;
    }
    logger.warn(`[progress][interrupt] ${signal} received; finishing the current call and saving progress.`);
    controller.abort();
  };

  for (const signal of INTERRUPT_SIGNALS) {
    target.on(signal, onSignal);
  }

  return () => {
    for (const signal of INTERRUPT_SIGNALS) {
      target.off(signal, onSignal);
    }
  };
}
