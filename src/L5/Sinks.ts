// src/L5/Sinks.ts
import fs from 'fs';
import path from 'path';
import type { Attempt } from '../L0/Ontology.js';
import type { IAuditSink } from '../Platform/Ports.js';
import { BindingError, ErrorCode } from '../Errors.js';

/**
 * Keeps every attempt in memory. Useful for tests and inspection.
 */
export class InMemorySink implements IAuditSink {
    public readonly attempts: Attempt[] = [];
    public flushCount = 0;
    public closed = false;

    write(attempt: Attempt): void {
        this.attempts.push(attempt);
    }

    flush(): void {
        this.flushCount++;
    }

    close(): void {
        this.closed = true;
    }

    successes(): Attempt[] {
        return this.attempts.filter(a => a.success);
    }

    failures(): Attempt[] {
        return this.attempts.filter(a => !a.success);
    }
}

export interface JsonlSinkOptions {
    bufferSize?: number;
    append?: boolean;
}

/**
 * Newline-delimited JSON, one attempt per line.
 * Buffered; the buffer is written when full, on flush, and on close.
 */
export class JsonlFileSink implements IAuditSink {
    private buffer: Attempt[] = [];
    private readonly bufferSize: number;
    private open = true;

    constructor(public readonly filePath: string, options: JsonlSinkOptions = {}) {
        this.bufferSize = Math.max(1, options.bufferSize ?? 10);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        if (options.append === false || !fs.existsSync(filePath)) {
            fs.writeFileSync(filePath, '', 'utf-8');
        }
    }

    write(attempt: Attempt): void {
        if (!this.open) {
            throw new BindingError(ErrorCode.SINK_CLOSED, `Sink for '${this.filePath}' is closed`, { filePath: this.filePath });
        }
        this.buffer.push(attempt);
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    flush(): void {
        if (!this.open || this.buffer.length === 0) return;
        const lines = this.buffer.map(a => JSON.stringify(a) + '\n').join('');
        fs.appendFileSync(this.filePath, lines, 'utf-8');
        this.buffer = [];
    }

    close(): void {
        if (!this.open) return;
        this.flush();
        this.open = false;
    }

    get pending(): number {
        return this.buffer.length;
    }
}

/**
 * Collects attempts and writes them as one pretty-printed JSON array on close.
 * Nothing is written when no attempt arrived.
 */
export class JsonFileSink implements IAuditSink {
    private collected: Attempt[] = [];

    constructor(public readonly filePath: string) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }

    write(attempt: Attempt): void {
        this.collected.push(attempt);
    }

    flush(): void {
        // Written on close only.
    }

    close(): void {
        if (this.collected.length === 0) return;
        fs.writeFileSync(this.filePath, JSON.stringify(this.collected, null, 2), 'utf-8');
        this.collected = [];
    }
}

/**
 * Fans every call out to each sink, in order.
 */
export class MultiplexSink implements IAuditSink {
    private readonly sinks: readonly IAuditSink[];

    constructor(...sinks: IAuditSink[]) {
        this.sinks = sinks;
    }

    write(attempt: Attempt): void {
        for (const sink of this.sinks) sink.write(attempt);
    }

    flush(): void {
        for (const sink of this.sinks) sink.flush();
    }

    close(): void {
        for (const sink of this.sinks) sink.close();
    }
}
