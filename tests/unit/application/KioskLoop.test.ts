import { KioskLoop } from '../../../src/application/KioskLoop';
import { IMediaPlayer } from '../../../src/domain/ports/IMediaPlayer';

function createPlayer(): jest.Mocked<IMediaPlayer> {
    return {
        play: jest.fn(),
        hasEnded: jest.fn().mockReturnValue(false),
        restart: jest.fn(),
        stop: jest.fn(),
    };
}

describe('KioskLoop', () => {
    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should restart playback when it ends', () => {
        const player = createPlayer();
        player.hasEnded.mockReturnValueOnce(false).mockReturnValueOnce(true);
        const loop = new KioskLoop(player);

        loop.start();
        jest.advanceTimersByTime(1500);
        loop.stop();

        expect(player.hasEnded).toHaveBeenCalledTimes(3);
        expect(player.restart).toHaveBeenCalledTimes(1);
    });

    it('should emit a keep-alive every second', () => {
        const onKeepAlive = jest.fn();
        const loop = new KioskLoop(createPlayer(), { onKeepAlive });

        loop.start();
        jest.advanceTimersByTime(3000);
        loop.stop();
        jest.advanceTimersByTime(3000);

        expect(onKeepAlive).toHaveBeenCalledTimes(3);
        expect(loop.running).toBe(false);
    });

    it('should ignore a second start', () => {
        const player = createPlayer();
        const loop = new KioskLoop(player, { playbackPollIntervalMs: 100 });

        loop.start();
        loop.start();
        jest.advanceTimersByTime(100);
        loop.stop();

        expect(player.hasEnded).toHaveBeenCalledTimes(1);
    });
});
