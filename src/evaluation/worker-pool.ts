import { Worker } from 'node:worker_threads';
import { availableParallelism } from 'node:os';
import { matchPartition, type PartitionMatch } from '../nlp/fuzzy-match.js';
import { divide } from '../utils/partition.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Worker body. The matching kernel travels as source text, so the worker runs
 * the exact code the calling thread would run inline.
 */
const WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const matchPartition = ${matchPartition.toString()};
parentPort.postMessage(matchPartition(workerData.titles, workerData.candidates));
`;

interface PartitionTask {
    titles: readonly string[];
    candidates: readonly string[];
}

/**
 * Fixed-size pool of worker threads for CPU-bound title matching.
 *
 * Titles are split into contiguous partitions, one per worker. Workers share
 * nothing: each gets a copy of its titles and of the candidate list, and
 * posts back its matches. `run` resolves once every partition has reported
 * (a join, not a race) and concatenates the results in partition order.
 */
export class MatchWorkerPool {
    readonly size: number;

    constructor(size: number = availableParallelism()) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
        }
        this.size = size;
    }

    async run(titles: readonly string[], candidates: readonly string[]): Promise<PartitionMatch[]> {
        if (titles.length === 0) return [];

        const partitions = divide(titles, Math.min(this.size, titles.length));
        logger.debug({ workers: partitions.length, titles: titles.length, candidates: candidates.length }, 'Dispatching match partitions');

        const results = await Promise.all(
            partitions.map((partition) => runWorker({ titles: partition, candidates }))
        );
        return results.flat();
    }
}

function runWorker(task: PartitionTask): Promise<PartitionMatch[]> {
    return new Promise((resolve, reject) => {
        const worker = new Worker(WORKER_SOURCE, { eval: true, workerData: task });
        let settled = false;

        worker.once('message', (message: PartitionMatch[]) => {
            settled = true;
            resolve(message);
        });
        worker.once('error', (error) => {
            settled = true;
            reject(error);
        });
        worker.once('exit', (code) => {
            if (!settled) {
                reject(new Error(`Match worker exited with code ${code} before reporting`));
            }
        });
    });
}
