import { ConsoleWizard, SENT_MESSAGE, formatEnhanceStatus, formatUploadStatus } from '../../../src/presentation/ConsoleWizard';
import { PipelineOrchestrator } from '../../../src/application/PipelineOrchestrator';
import { KioskWizard } from '../../../src/application/KioskWizard';
import { AttachClient } from '../../../src/application/AttachClient';
import { RenderJobController } from '../../../src/application/RenderJobController';
import { PostProcessor } from '../../../src/application/PostProcessor';
import { TransferUploader } from '../../../src/application/TransferUploader';
import { NotificationDispatcher } from '../../../src/application/NotificationDispatcher';
import { PreviewStreamManager } from '../../../src/application/PreviewStreamManager';
import { PipelineErrorService } from '../../../src/application/services/PipelineErrorService';
import { IRenderEngine } from '../../../src/domain/ports/IRenderEngine';
import { IMediaProbe } from '../../../src/domain/ports/IMediaProbe';
import { IRemoteStorageClient } from '../../../src/domain/ports/IRemoteStorageClient';
import { StaticDisplayProvider } from '../../../src/domain/ports/IDisplayProvider';
import { scriptedConsole } from '../../helpers/scriptedConsole';

describe('ConsoleWizard formatting', () => {
    it('should show the enhance percentage while rendering', () => {
        expect(formatEnhanceStatus({ phase: 'enhancing', percent: 37 })).toBe('Enhancing: 37%');
    });

    it('should show completion and failure', () => {
        expect(formatEnhanceStatus({ phase: 'complete', percent: 100 })).toBe("It's complete");
        expect(formatEnhanceStatus({ phase: 'failed', percent: 52 })).toBe('Enhancement failed');
    });

    it('should show upload percentage and seconds remaining on two lines', () => {
        expect(formatUploadStatus({ fractionComplete: 0.426, estimatedSecondsRemaining: 9, done: false }))
            .toBe('Uploading: 42%\n9 seconds remaining');
    });

    it('should have a fixed confirmation message', () => {
        expect(SENT_MESSAGE).toBe('Sent! Check email & SMS.');
    });
});

describe('ConsoleWizard', () => {
    function createPipeline(engineInstalled: boolean) {
        const engine: jest.Mocked<IRenderEngine> = {
            name: 'fake-engine',
            isInstalled: jest.fn().mockResolvedValue(engineInstalled),
            isRunning: jest.fn().mockResolvedValue(false),
            connect: jest.fn().mockResolvedValue(null),
            launch: jest.fn().mockResolvedValue(undefined),
        };
        const probe: jest.Mocked<IMediaProbe> = {
            probe: jest.fn().mockResolvedValue({ durationSeconds: 5 }),
            trim: jest.fn().mockResolvedValue(undefined),
        };
        const storage: jest.Mocked<IRemoteStorageClient> = {
            createResumableUpload: jest.fn(),
            nextChunk: jest.fn(),
            queryStatus: jest.fn(),
            grantPublicRead: jest.fn(),
            shareUrl: jest.fn(),
        };
        const orchestrator = new PipelineOrchestrator(
            {
                attachClient: new AttachClient(engine),
                renderController: new RenderJobController({ projectName: 'EnhanceTemplate', templatePath: '/templates/EnhanceTemplate.json' }),
                postProcessor: new PostProcessor(probe),
                uploader: new TransferUploader(storage),
                dispatcher: new NotificationDispatcher({ send: jest.fn() }, { senderAddress: 'kiosk@example.com' }),
                mediaProbe: probe,
                previews: new PreviewStreamManager(new StaticDisplayProvider([{ x: 0, y: 0, width: 1080, height: 1920 }]), {
                    launch: (path, display) => ({ path, display, hasExited: () => false, hasFailed: () => false, stop: () => undefined }),
                }),
            },
            { inputPath: '/captures/clip.mov', outputDir: '/saved', attachMaxAttempts: 1, attachRetryDelayMs: 1 }
        );
        const wizard = new KioskWizard(orchestrator, { Example: '@sms.example.net' });
        return { orchestrator, wizard };
    }

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should re-ask invalid answers and report a pipeline failure', async () => {
        const { orchestrator, wizard } = createPipeline(false);
        const terminal = scriptedConsole({
            'Email: ': ['not-an-email', 'guest@example.com'],
            'Phone (10 digits, blank to skip): ': ['12345', ''],
            'Rate your experience (1-5): ': ['7', '4'],
        });
        orchestrator.start();

        const step = await new ConsoleWizard(wizard, orchestrator, terminal.io, new PipelineErrorService()).run();

        const transcript = terminal.transcript();
        expect(transcript).toContain('Please enter a valid email address.\n');
        expect(transcript).toContain('Phone number must be exactly 10 digits.\n');
        expect(transcript).toContain('Please choose 1 to 5 stars.\n');
        expect(transcript).toContain('The enhancement software is not installed on this kiosk. Please ask a staff member for help.\n');
        expect(step).toBe('rating');
        expect(wizard.currentRating).toBe(4);
        expect(orchestrator.state).toBe('failed');

        wizard.dispose();
        orchestrator.shutdown();
    });
});
