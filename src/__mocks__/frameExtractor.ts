/**
 * In-process stand-in for the ffmpeg frame extractor
 */

import fs from 'fs';
import type { FrameExtractionRequest, IFrameExtractor } from '../domain/interfaces/IFrameExtractor';

// SOI + APP0 marker followed by filler; enough for the cache's JPEG check
export const FAKE_JPEG = Buffer.concat([
    Buffer.from([0xff, 0xd8, 0xff, 0xe0]),
    Buffer.from('test-frame')
]);

export type FakeOutput = 'jpeg' | 'empty' | 'not-jpeg' | 'nothing';

export class FakeFrameExtractor implements IFrameExtractor {
    readonly calls: FrameExtractionRequest[] = [];
    active = 0;
    maxActive = 0;

    private output: FakeOutput = 'jpeg';
    private failure: Error | null = null;
    private gate: Promise<void> | null = null;

    /**
     * Makes the following extractions reject with the given error
     */
    failWith(error: Error | null): void {
        this.failure = error;
    }

    produce(output: FakeOutput): void {
        this.output = output;
    }

    /**
     * Blocks every extraction until the returned function is called
     */
    hold(): () => void {
        let release: () => void = () => undefined;
        this.gate = new Promise<void>((resolve) => {
            release = () => {
                this.gate = null;
                resolve();
            };
        });
        return release;
    }

    async extract(request: FrameExtractionRequest): Promise<void> {
        this.calls.push(request);
        this.active += 1;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            if (this.gate) {
                await this.gate;
            }
            if (this.failure) {
                throw this.failure;
            }
            switch (this.output) {
                case 'jpeg':
                    await fs.promises.writeFile(request.outputPath, FAKE_JPEG);
                    break;
                case 'empty':
                    await fs.promises.writeFile(request.outputPath, Buffer.alloc(0));
                    break;
                case 'not-jpeg':
                    await fs.promises.writeFile(request.outputPath, 'GIF89a');
                    break;
                case 'nothing':
                    break;
            }
        } finally {
            this.active -= 1;
        }
    }
}
