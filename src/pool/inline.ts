import { assertTuning } from '../config';
import type { SearchJob, SearchSink, WorkerPool } from '../search';
import { runBatch } from '../search';

const yieldToEventLoop = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Cooperative workers sharing the current thread. Each one runs a batch,
 * reports its attempts and yields so the others (and abort listeners) get a turn.
 * The first worker to fail stops the rest, and `run` rejects with its error.
 */
export class InlinePool implements WorkerPool {
    constructor(private readonly workers: number) {
        assertTuning({ workers });
    }

    async run(job: SearchJob, sink: SearchSink, signal: AbortSignal): Promise<void> {
        const stop = new AbortController();
        const onAbort = () => stop.abort();
        signal.addEventListener('abort', onAbort, { once: true });
        if (signal.aborted) {
            stop.abort();
        }

        const loops: Promise<void>[] = [];
        for (let i = 0; i < this.workers; i++) {
            loops.push(this.guarded(job, sink, stop));
        }
        const outcomes = await Promise.allSettled(loops);
        signal.removeEventListener('abort', onAbort);

        const failed = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
        if (failed !== undefined) {
            throw failed.reason;
        }
    }

    private async guarded(job: SearchJob, sink: SearchSink, stop: AbortController) {
        try {
            await this.loop(job, sink, stop.signal);
        } catch (error) {
            stop.abort();
            throw error;
        }
    }

    private async loop(job: SearchJob, sink: SearchSink, signal: AbortSignal) {
        while (!signal.aborted) {
            const attempts = runBatch(job, () => signal.aborted, (result) => sink.accept(result));
            sink.progress(attempts);
            await yieldToEventLoop();
        }
    }
}
