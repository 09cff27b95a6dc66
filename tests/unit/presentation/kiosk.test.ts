import { createCodecSettings, createKiosk, createRenderEngine } from '../../../src/presentation/kiosk';
import { Config, loadConfig } from '../../../src/config';

describe('kiosk wiring', () => {
    const originalEnv = process.env;

    function config(overrides: Record<string, string> = {}): Config {
        process.env = {
            ...originalEnv,
            INPUT_VIDEO_PATH: '/captures/clip.mov',
            GOOGLE_ACCESS_TOKEN: 'test-token',
            SENDER_ADDRESS: 'kiosk@example.com',
            RENDER_ENGINE: 'ffmpeg',
            ...overrides,
        };
        return loadConfig();
    }

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should use the local ffmpeg engine by default', () => {
        expect(createRenderEngine(config()).name).toBe('ffmpeg');
    });

    it('should use the bridge engine when configured', () => {
        const engine = createRenderEngine(config({
            RENDER_ENGINE: 'remote',
            RENDER_ENGINE_EXECUTABLE: '/opt/engine/bin/engine',
        }));

        expect(engine.name).toBe('remote');
    });

    it('should take codec settings from the config and keep the engine extras', () => {
        const codec = createCodecSettings(config({
            RENDER_VIDEO_CODEC: 'H.264',
            RENDER_ENCODER: '',
            RENDER_QUALITY: 'High',
            RENDER_FORMAT: 'mov',
        }));

        expect(codec).toMatchObject({ format: 'mov', videoCodec: 'H.264', encoder: undefined, quality: 'High', exportAudio: true });
        expect(codec.extra).toMatchObject({ RateControl: 'VBR' });
    });

    it('should build an idle kiosk that shuts down cleanly', () => {
        const kiosk = createKiosk(config());

        expect(kiosk.orchestrator.state).toBe('idle');
        expect(kiosk.wizard.currentStep).toBe('email');
        kiosk.shutdown();
    });
});
