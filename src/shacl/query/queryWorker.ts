// src/shacl/query/queryWorker.ts
import { Worker } from 'node:worker_threads';
import { errorMessage, QueryExecutionError, QueryTimeoutError } from '../../errors';
import type { Term } from '../../rdf/terms';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ component: 'query-worker' });

/**
 * Plain-object term, the form terms take between threads
 */
export interface WireTerm {
    termType: Term['termType'];
    value: string;
    language?: string;
    datatype?: string;
}

export type WireTriple = readonly [WireTerm, WireTerm, WireTerm];

// Plain CommonJS, evaluated inside the worker; oxigraph is loaded from the path the parent resolved.
const WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const oxigraph = require(workerData.modulePath);

function toTerm(term) {
    switch (term.termType) {
        case 'NamedNode':
            return oxigraph.namedNode(term.value);
        case 'BlankNode':
            return oxigraph.blankNode(term.value);
        default:
            return term.language
                ? oxigraph.literal(term.value, term.language)
                : oxigraph.literal(term.value, oxigraph.namedNode(term.datatype));
    }
}

function toWire(term) {
    const wire = { termType: term.termType, value: term.value };
    if (term.termType === 'Literal') {
        wire.language = term.language;
        wire.datatype = term.datatype.value;
    }
    return wire;
}

const store = new oxigraph.Store();
for (const [s, p, o] of workerData.triples) {
    store.add(oxigraph.quad(toTerm(s), toTerm(p), toTerm(o), oxigraph.defaultGraph()));
}

parentPort.on('message', (query) => {
    let result;
    try {
        result = store.query(query);
    } catch (error) {
        parentPort.postMessage({ type: 'error', message: error instanceof Error ? error.message : String(error) });
        return;
    }
    if (!Array.isArray(result)) {
        parentPort.postMessage({ type: 'error', message: 'Query did not return SELECT solutions' });
        return;
    }
    parentPort.postMessage({
        type: 'rows',
        rows: result.map(solution => Array.from(solution, ([name, term]) => [name, toWire(term)])),
    });
});

parentPort.postMessage({ type: 'ready' });
`;

type WorkerReply =
    | { type: 'ready' }
    | { type: 'rows'; rows: unknown }
    | { type: 'error'; message: string };

function parseReply(message: unknown): WorkerReply | undefined {
    if (typeof message !== 'object' || message === null || !('type' in message)) {
        return undefined;
    }
    switch (message.type) {
        case 'ready':
            return { type: 'ready' };
        case 'rows':
            return { type: 'rows', rows: 'rows' in message ? message.rows : undefined };
        case 'error':
            return { type: 'error', message: 'message' in message ? String(message.message) : 'unknown error' };
        default:
            return undefined;
    }
}

interface Job {
    query: string;
    timeoutMs: number;
    resolve: (rows: unknown) => void;
    reject: (error: Error) => void;
}

interface ActiveJob {
    job: Job;
    timer: ReturnType<typeof setTimeout>;
    started: number;
}

/**
 * A worker thread holding one graph in an oxigraph store. Queries run one at a time; a query that
 * outlives its timeout is stopped by terminating the thread, and the next query starts a new one.
 * The timeout clock starts when the query is handed to a loaded worker.
 */
export class QueryWorker {
    private _worker: Worker | undefined;
    private _ready = false;
    private _active: ActiveJob | undefined;
    private readonly _queue: Job[] = [];

    constructor(
        private readonly _triples: readonly WireTriple[],
        private readonly _modulePath: string
    ) {}

    /**
     * Raw solutions as posted by the worker: an array of [variable, WireTerm] entry lists
     */
    public run(query: string, timeoutMs: number): Promise<unknown> {
        return new Promise((resolve, reject) => {
            this._queue.push({ query, timeoutMs, resolve, reject });
            this.pump();
        });
    }

    public async close(): Promise<void> {
        const worker = this.detach();
        const active = this._active;
        this._active = undefined;
        if (active) {
            clearTimeout(active.timer);
            active.job.reject(new QueryExecutionError('Query engine closed', active.job.query));
        }
        this.rejectQueued('Query engine closed');
        if (worker) {
            await worker.terminate();
        }
    }

    private pump(): void {
        if (this._active) {
            return;
        }
        if (this._queue.length === 0) {
            // an idle worker does not keep the process alive
            this._worker?.unref();
            return;
        }

        const worker = this.ensureWorker();
        worker.ref();
        if (!this._ready) {
            return;
        }
        const job = this._queue.shift();
        if (!job) {
            return;
        }
        const timer = setTimeout(() => this.onTimeout(), job.timeoutMs);
        this._active = { job, timer, started: Date.now() };
        worker.postMessage(job.query);
    }

    private ensureWorker(): Worker {
        if (this._worker) {
            return this._worker;
        }
        const worker = new Worker(WORKER_SOURCE, {
            eval: true,
            workerData: { modulePath: this._modulePath, triples: this._triples },
        });
        worker.on('message', (message: unknown) => this.onMessage(worker, message));
        worker.on('error', (error: Error) => this.onFailure(worker, error));
        worker.on('exit', (code: number) => this.onFailure(worker, new Error(`Query worker exited with code ${code}`)));
        this._worker = worker;
        this._ready = false;
        return worker;
    }

    private onMessage(worker: Worker, message: unknown): void {
        if (worker !== this._worker) {
            return;
        }
        const reply = parseReply(message);
        if (!reply) {
            log.warn('Unrecognised message from query worker ignored');
            return;
        }
        if (reply.type === 'ready') {
            this._ready = true;
            this.pump();
            return;
        }

        const active = this._active;
        if (!active) {
            return;
        }
        clearTimeout(active.timer);
        this._active = undefined;
        if (reply.type === 'rows') {
            active.job.resolve(reply.rows);
        } else {
            active.job.reject(new QueryExecutionError(`Query execution failed: ${reply.message}`, active.job.query));
        }
        this.pump();
    }

    private onTimeout(): void {
        const active = this._active;
        if (!active) {
            return;
        }
        this._active = undefined;
        this.terminate();
        active.job.reject(new QueryTimeoutError(active.job.query, active.job.timeoutMs, Date.now() - active.started));
        this.pump();
    }

    private onFailure(worker: Worker, error: Error): void {
        if (worker !== this._worker) {
            return;
        }
        const wasReady = this._ready;
        this.detach();
        log.warn({ err: error.message, ready: wasReady }, 'Query worker stopped');

        const active = this._active;
        this._active = undefined;
        if (active) {
            clearTimeout(active.timer);
            active.job.reject(new QueryExecutionError(`Query worker failed: ${error.message}`, active.job.query, error));
        }
        if (!wasReady) {
            // the store could not be loaded; a new worker would fail the same way
            this.rejectQueued(`Query worker failed to start: ${error.message}`);
        }
        this.pump();
    }

    private terminate(): void {
        const worker = this.detach();
        if (worker) {
            void worker.terminate().catch((e: unknown) => {
                log.warn({ err: errorMessage(e) }, 'Query worker did not terminate cleanly');
            });
        }
    }

    private detach(): Worker | undefined {
        const worker = this._worker;
        this._worker = undefined;
        this._ready = false;
        return worker;
    }

    private rejectQueued(reason: string): void {
        for (const job of this._queue.splice(0)) {
            job.reject(new QueryExecutionError(reason, job.query));
        }
    }
}
