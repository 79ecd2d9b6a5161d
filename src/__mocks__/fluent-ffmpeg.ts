/**
 * Mock implementation of fluent-ffmpeg for testing
 * Records the command chain and lets tests decide how ffprobe and run complete
 */

import { EventEmitter } from 'events';

export interface MockFfprobeData {
    format: { duration?: number };
}

export type FfprobeCallback = (error: unknown, data: MockFfprobeData | undefined) => void;

export class MockFfmpegCommand extends EventEmitter {
    ffmpegPath?: string;
    ffprobePath?: string;
    seek?: number | string;
    frameCount?: number;
    filters: string[] = [];
    options: string[] = [];
    outputPath?: string;
    killedWith?: string;
    ran = false;
    started = false;

    constructor(readonly input: string) {
        super();
    }

    setFfmpegPath(path: string): this {
        this.ffmpegPath = path;
        return this;
    }

    setFfprobePath(path: string): this {
        this.ffprobePath = path;
        return this;
    }

    seekInput(seek: number | string): this {
        this.seek = seek;
        return this;
    }

    frames(count: number): this {
        this.frameCount = count;
        return this;
    }

    videoFilters(filter: string): this {
        this.filters.push(filter);
        return this;
    }

    outputOptions(options: string[]): this {
        this.options.push(...options);
        return this;
    }

    output(path: string): this {
        this.outputPath = path;
        return this;
    }

    // Like fluent-ffmpeg, a signal before the process has spawned goes nowhere
    kill(signal: string): this {
        if (this.started) {
            this.killedWith = signal;
        }
        return this;
    }

    start(): void {
        this.started = true;
        this.emit('start', `ffmpeg -i ${this.input}`);
    }

    run(): void {
        this.ran = true;
        ffmpegBehaviour.run(this);
    }

    ffprobe(callback: FfprobeCallback): void {
        const outcome = ffmpegBehaviour.ffprobe;
        if (outcome === 'hang') {
            return;
        }
        setImmediate(() => {
            if (outcome instanceof Error) {
                callback(outcome, undefined);
            } else {
                callback(null, { format: { duration: outcome ?? undefined } });
            }
        });
    }
}

export const ffmpegBehaviour: {
    // Duration reported by ffprobe, the error it fails with, or 'hang' for no answer
    ffprobe: number | Error | null | 'hang';
    run: (command: MockFfmpegCommand) => void;
} = {
    ffprobe: null,
    run: startAndEnd
};

function startAndEnd(command: MockFfmpegCommand): void {
    setImmediate(() => {
        command.start();
        command.emit('end', null, null);
    });
}

export const mockCommands: MockFfmpegCommand[] = [];

export function resetFfmpegMock(): void {
    mockCommands.length = 0;
    ffmpegBehaviour.ffprobe = null;
    ffmpegBehaviour.run = startAndEnd;
}

export function mockFfmpeg(input: string): MockFfmpegCommand {
    const command = new MockFfmpegCommand(input);
    mockCommands.push(command);
    return command;
}
