import { EventEmitter } from 'events';

/**
 * Stand-in for a fluent-ffmpeg command. Records the builder calls; tests drive
 * completion by emitting 'progress', 'end' or 'error'.
 */
export class MockFfmpegCommand extends EventEmitter {
    readonly calls: Array<[string, unknown[]]> = [];
    savedTo?: string;
    killedWith?: string;

    constructor(readonly source: string) {
        super();
    }

    videoCodec(...args: unknown[]): this {
        return this.record('videoCodec', args);
    }

    audioCodec(...args: unknown[]): this {
        return this.record('audioCodec', args);
    }

    noAudio(): this {
        return this.record('noAudio', []);
    }

    videoFilters(...args: unknown[]): this {
        return this.record('videoFilters', args);
    }

    audioFilters(...args: unknown[]): this {
        return this.record('audioFilters', args);
    }

    outputOptions(...args: unknown[]): this {
        return this.record('outputOptions', args);
    }

    format(...args: unknown[]): this {
        return this.record('format', args);
    }

    save(output: string): this {
        this.savedTo = output;
        return this;
    }

    kill(signal: string): void {
        this.killedWith = signal;
    }

    argsOf(name: string): unknown[] | undefined {
        return this.calls.find(([method]) => method === name)?.[1];
    }

    private record(name: string, args: unknown[]): this {
        this.calls.push([name, args]);
        return this;
    }
}

export interface MockProbeMetadata {
    format: { duration?: number };
    streams: Array<{ codec_type?: string; width?: number; height?: number }>;
}

export interface MockFfmpegState {
    available: boolean;
    probeError?: Error;
    probeMetadata?: MockProbeMetadata;
    commands: MockFfmpegCommand[];
}

export const mockFfmpegState: MockFfmpegState = { available: true, commands: [] };

export function resetMockFfmpeg(): void {
    mockFfmpegState.available = true;
    mockFfmpegState.probeError = undefined;
    mockFfmpegState.probeMetadata = undefined;
    mockFfmpegState.commands = [];
}

export function lastCommand(): MockFfmpegCommand {
    const command = mockFfmpegState.commands[mockFfmpegState.commands.length - 1];
    if (!command) {
        throw new Error('No ffmpeg command was created');
    }
    return command;
}

/**
 * Module factory for `jest.mock('fluent-ffmpeg', ...)`.
 */
export function createMockFluentFfmpeg() {
    const factory = jest.fn((source: string) => {
        const command = new MockFfmpegCommand(source);
        mockFfmpegState.commands.push(command);
        return command;
    });
    return Object.assign(factory, {
        getAvailableFormats: jest.fn((callback: (err: Error | null, formats: object) => void) => {
            callback(mockFfmpegState.available ? null : new Error('Cannot find ffmpeg'), {});
        }),
        ffprobe: jest.fn((_file: string, callback: (err: Error | null, metadata?: MockProbeMetadata) => void) => {
            callback(mockFfmpegState.probeError ?? null, mockFfmpegState.probeMetadata);
        }),
    });
}
