/**
 * @module
 * Console status.
 */
import readline = require('readline');

/**
 * Console progress status.
 */
export interface Progress {
    status: string;
    /** Write chunk to console. */
    write(chunk: Buffer | string): void;
    /** Renders status. */
    render(): void;
    /** Un-renders status by printing a newline. */
    unrender(): void;
}

/**
 * Stream the progress is written to. `columns` and `isTTY` are set on terminals.
 */
export interface ProgressStream extends NodeJS.WritableStream {
    columns?: number;
    isTTY?: boolean;
}

class ConsoleProgress implements Progress {
    status: string;
    private readonly stream: ProgressStream;
    private rendered: boolean;

    constructor(stream: ProgressStream) {
        this.status = '';
        this.stream = stream;
        this.rendered = false;
    }

    write(chunk: Buffer | string): void {
        this.unrender();
        this.stream.write(chunk);
    }

    render(): void {
        if (!this.stream.isTTY) {
            // No cursor control: print each status on its own line.
            this.stream.write(`${this.status}\n`);
            return;
        }
        if (this.rendered)
            readline.cursorTo(this.stream, 0);
        this.stream.write(truncateString(this.status, this.stream.columns || 80));
        if (this.rendered)
            readline.clearLine(this.stream, 1);
        this.rendered = true;
    }

    unrender(): void {
        if (this.rendered) {
            this.stream.write('\n');
            this.rendered = false;
        }
    }
}

/**
 * Create status.
 */
export function createProgress(stream?: ProgressStream): Progress {
    if (!stream)
        stream = process.stdout;
    return new ConsoleProgress(stream);
}

function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}
