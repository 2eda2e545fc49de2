import cluster from 'cluster';
import type { Worker } from 'cluster';
import path from 'path';
import { assertTuning } from '../config';
import type { Logger } from '../logger';
import { workerMessageSchema } from '../messages';
import type { PrimaryMessage } from '../messages';
import type { SearchJob, SearchSink, WorkerPool } from '../search';

// Time a stopped worker gets to exit on its own before it is killed.
const STOP_GRACE_MS = 5000;

/**
 * Script the forked workers run. From a TypeScript source tree the workers
 * load it through tsx; from a build they run the compiled file directly.
 */
export function workerEntry(): { exec: string; execArgv: string[] } {
    const ext = path.extname(__filename);
    return {
        exec: path.join(__dirname, '..', `worker${ext}`),
        execArgv: ext === '.ts' ? ['--import', 'tsx'] : [],
    };
}

export class ClusterPool implements WorkerPool {
    constructor(
        private readonly workers: number,
        private readonly logger: Logger,
    ) {
        assertTuning({ workers });
    }

    run(job: SearchJob, sink: SearchSink, signal: AbortSignal): Promise<void> {
        if (!cluster.isPrimary) {
            return Promise.reject(new Error('ClusterPool can only run in the primary process'));
        }
        cluster.setupPrimary(workerEntry());

        return new Promise<void>((resolve, reject) => {
            const live = new Set<Worker>();
            const ready = new Set<Worker>();
            let failure: Error | undefined;

            const send = (worker: Worker, message: PrimaryMessage) => {
                if (worker.isConnected()) {
                    worker.send(message);
                }
            };

            const stopWorker = (worker: Worker) => {
                send(worker, { type: 'stop' });
                setTimeout(() => {
                    if (!worker.isDead()) {
                        this.logger.warn({ worker: worker.id }, 'worker did not stop, killing');
                        worker.kill();
                    }
                }, STOP_GRACE_MS).unref();
            };

            const stopAll = () => {
                for (const worker of ready) {
                    stopWorker(worker);
                }
            };

            const settle = () => {
                if (live.size > 0) {
                    return;
                }
                signal.removeEventListener('abort', stopAll);
                if (failure !== undefined) {
                    reject(failure);
                } else {
                    resolve();
                }
            };

            signal.addEventListener('abort', stopAll, { once: true });

            for (let i = 0; i < this.workers; i++) {
                const worker = cluster.fork();
                live.add(worker);

                worker.on('message', (raw: unknown) => {
                    const parsed = workerMessageSchema.safeParse(raw);
                    if (!parsed.success) {
                        this.logger.warn({ worker: worker.id, issues: parsed.error.issues }, 'ignoring malformed worker message');
                        return;
                    }

                    const message = parsed.data;
                    switch (message.type) {
                        case 'ready':
                            ready.add(worker);
                            if (signal.aborted) {
                                stopWorker(worker);
                            } else {
                                send(worker, { type: 'start', job });
                            }
                            break;
                        case 'found':
                            sink.accept(message.result);
                            break;
                        case 'progress':
                            sink.progress(message.attempts);
                            break;
                    }
                });

                worker.on('exit', (code: number, exitSignal: string) => {
                    live.delete(worker);
                    ready.delete(worker);
                    this.logger.debug({ worker: worker.id, code, signal: exitSignal }, 'worker finished');

                    if (!signal.aborted && failure === undefined) {
                        failure = new Error(`worker ${worker.id} exited unexpectedly (code ${code}, signal ${exitSignal})`);
                        for (const other of live) {
                            other.kill();
                        }
                    }
                    settle();
                });
            }

            this.logger.info({ workers: this.workers }, 'cluster workers forked');
        });
    }
}
