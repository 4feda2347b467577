/**
 * @file Capture Session
 *
 * Multi-line input state machine behind `cat > file`, `cat >> file` and
 * `cat > file << EOF`. A session buffers raw lines until its end condition
 * and then flushes them to the target file in one write.
 *
 * @module
 */

import fs from 'fs';
import type { CaptureRequest } from './types.js';
import { IOFailure, errorMessage_get } from './errors.js';

export type CaptureFeedResult =
    | { state: 'buffered' }
    | { state: 'flushed' };

/**
 * One open capture. The interpreter holds at most one at a time.
 */
export class CaptureSession {
    private readonly lines: string[] = [];

    constructor(public readonly request: CaptureRequest) {}

    /**
     * Number of lines buffered so far.
     */
    public lineCount_get(): number {
        return this.lines.length;
    }

    /**
     * Feed one raw input line.
     *
     * Heredoc sessions end when the trimmed line equals the terminator;
     * raw-input sessions end on a blank line. The ending line is never
     * written.
     *
     * @param rawLine - Line as received, trailing CR/LF stripped here.
     * @returns Whether the line was buffered or the session flushed.
     * @throws IOFailure when the flush write fails; the buffer is lost.
     */
    public line_feed(rawLine: string): CaptureFeedResult {
        const line: string = rawLine.replace(/[\r\n]+$/, '');
        if (!this.terminator_matches(line)) {
            this.lines.push(line);
            return { state: 'buffered' };
        }
        this.content_flush();
        return { state: 'flushed' };
    }

    /**
     * Render the buffered content as it will be written. An empty buffer
     * renders as a single newline.
     */
    public content_render(): string {
        return `${this.lines.join('\n')}\n`;
    }

    private terminator_matches(line: string): boolean {
        const trimmed: string = line.trim();
        if (this.request.kind === 'heredoc') {
            return trimmed === this.request.terminator;
        }
        return trimmed === '';
    }

    private content_flush(): void {
        const content: string = this.content_render();
        try {
            if (this.request.writeMode === 'append') {
                fs.appendFileSync(this.request.targetFile, content, 'utf-8');
            } else {
                fs.writeFileSync(this.request.targetFile, content, 'utf-8');
            }
        } catch (error: unknown) {
            throw new IOFailure(`cat: write error: ${errorMessage_get(error)}`);
        } finally {
            this.lines.length = 0;
        }
    }
}
