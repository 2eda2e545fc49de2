import { z } from 'zod';

export const searchJobSchema = z.object({
    deployer: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
    prefix: z.string().regex(/^[0-9a-f]*$/),
    saltPrefix: z.string().optional(),
    batchSize: z.number().int().positive(),
});

export const searchResultSchema = z.object({
    salt: z.string(),
    address: z.string(),
    digestHex: z.string(),
});

/** Work handed to every worker of a search. Plain data so it can cross IPC. */
export type SearchJob = z.infer<typeof searchJobSchema>;
export type SearchResult = z.infer<typeof searchResultSchema>;

// primary -> worker
export const primaryMessageSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('start'), job: searchJobSchema }),
    z.object({ type: z.literal('stop') }),
]);

// worker -> primary
export const workerMessageSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('ready') }),
    z.object({ type: z.literal('found'), result: searchResultSchema }),
    z.object({ type: z.literal('progress'), attempts: z.number().int().nonnegative() }),
]);

export type PrimaryMessage = z.infer<typeof primaryMessageSchema>;
export type WorkerMessage = z.infer<typeof workerMessageSchema>;
