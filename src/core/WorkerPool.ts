import { RunCancelledError } from './errors';

export interface WorkerPoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * Pool borné : `concurrency` workers tirent les éléments d'un curseur partagé.
 * Le worker ne doit pas rejeter pour une erreur métier (il renvoie son propre résultat) ;
 * un rejet arrête la distribution et remonte tel quel après la fin des workers en cours.
 * L'annulation arrête la distribution et lève RunCancelledError.
 */
export class WorkerPool {
  constructor(private readonly options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
  }

  async run<T, R>(items: readonly T[], worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const { signal } = this.options;
    const results: R[] = [];
    let cursor = 0;
    let failure: unknown = null;

    const next = async (): Promise<void> => {
      while (failure === null && !signal?.aborted && cursor < items.length) {
        const index = cursor++;
        try {
          results.push(await worker(items[index], index));
        } catch (error) {
          if (failure === null) failure = error;
        }
      }
    };

    const workerCount = Math.min(this.options.concurrency, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => next()));

    if (signal?.aborted) {
      throw new RunCancelledError(`Cancelled after ${cursor}/${items.length} items`);
    }
    if (failure !== null) {
      throw failure;
    }

    return results;
  }
}
