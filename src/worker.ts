import cluster from 'cluster';
import { makeLogger } from './logger';
import { primaryMessageSchema } from './messages';
import type { SearchJob, WorkerMessage } from './messages';
import { runBatch } from './search';

export function startWorker() {
    const logger = makeLogger({ worker: cluster.worker?.id }, undefined, 'stderr');
    let stopped = false;
    let running = false;
    let tries = 0;

    const send = (message: WorkerMessage) => {
        process.send?.(message);
    };

    const loop = (job: SearchJob) => {
        if (stopped) {
            logger.debug({ tries }, 'worker stopping');
            process.exit(0);
        }
        const attempts = runBatch(job, () => stopped, (result) => send({ type: 'found', result }));
        tries += attempts;
        send({ type: 'progress', attempts });
        // let a pending stop message in before the next batch
        setImmediate(() => loop(job));
    };

    process.on('message', (raw: unknown) => {
        const parsed = primaryMessageSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn({ issues: parsed.error.issues }, 'ignoring malformed message');
            return;
        }

        const message = parsed.data;
        if (message.type === 'stop') {
            stopped = true;
            if (!running) {
                process.exit(0);
            }
            return;
        }
        if (running) {
            return;
        }
        running = true;
        logger.debug({ prefix: message.job.prefix }, 'worker started');
        loop(message.job);
    });

    // primary went away
    process.on('disconnect', () => process.exit(0));

    send({ type: 'ready' });
}

if (cluster.isWorker) {
    startWorker();
}
