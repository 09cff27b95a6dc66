import { Config } from '../config';
import { IRenderEngine } from '../domain/ports/IRenderEngine';
import { IDisplayProvider, SingleDisplayProvider, StaticDisplayProvider } from '../domain/ports/IDisplayProvider';
import { IMediaPlayer, NullMediaPlayer } from '../domain/ports/IMediaPlayer';
import { DEFAULT_CODEC_SETTINGS, RenderCodecSettings } from '../domain/entities/RenderJobSpec';
import { AttachClient } from '../application/AttachClient';
import { RenderJobController } from '../application/RenderJobController';
import { PostProcessor } from '../application/PostProcessor';
import { TransferUploader } from '../application/TransferUploader';
import { NotificationDispatcher } from '../application/NotificationDispatcher';
import { PreviewStreamManager } from '../application/PreviewStreamManager';
import { PipelineOrchestrator } from '../application/PipelineOrchestrator';
import { KioskWizard } from '../application/KioskWizard';
import { KioskLoop } from '../application/KioskLoop';
import { PipelineErrorService } from '../application/services/PipelineErrorService';
import { RemoteRenderEngine } from '../infrastructure/render/RemoteRenderEngine';
import { FFmpegRenderEngine } from '../infrastructure/render/FFmpegRenderEngine';
import { FFmpegMediaProbe } from '../infrastructure/media/FFmpegMediaProbe';
import { DriveStorageClient } from '../infrastructure/storage/DriveStorageClient';
import { GmailMessagingTransport } from '../infrastructure/messaging/GmailMessagingTransport';
import { StaticAccessTokenProvider } from '../infrastructure/google/AccessTokenProvider';
import { FfplayMediaPlayer, FfplayPreviewLauncher } from '../infrastructure/preview/FfplayPreviewLauncher';

export interface Kiosk {
    orchestrator: PipelineOrchestrator;
    wizard: KioskWizard;
    loop: KioskLoop;
    shutdown(): void;
}

export function createRenderEngine(config: Config): IRenderEngine {
    if (config.renderEngine === 'remote') {
        return new RemoteRenderEngine({
            bridgeUrl: config.renderBridgeUrl,
            executablePath: config.renderEngineExecutable,
            launchArgs: config.renderEngineArgs,
        });
    }
    return new FFmpegRenderEngine(config.projectsDir);
}

export function createCodecSettings(config: Config): RenderCodecSettings {
    return {
        ...DEFAULT_CODEC_SETTINGS,
        format: config.renderFormat,
        videoCodec: config.renderVideoCodec,
        encoder: config.renderEncoder,
        quality: config.renderQuality,
    };
}

function createDisplayProvider(config: Config): IDisplayProvider {
    return config.displays ? new StaticDisplayProvider(config.displays) : new SingleDisplayProvider();
}

/**
 * Wires the kiosk for one capture → enhance → deliver session.
 */
export function createKiosk(config: Config): Kiosk {
    const tokens = new StaticAccessTokenProvider(config.googleAccessToken);
    const displays = createDisplayProvider(config);
    const launcher = new FfplayPreviewLauncher(config.previewPlayer);
    const player: IMediaPlayer = config.primaryPlayback
        ? new FfplayMediaPlayer(launcher, displays.listDisplays()[0])
        : new NullMediaPlayer();
    const probe = new FFmpegMediaProbe();
    const previews = new PreviewStreamManager(displays, launcher);

    const orchestrator = new PipelineOrchestrator(
        {
            attachClient: new AttachClient(createRenderEngine(config)),
            renderController: new RenderJobController({
                projectName: config.projectName,
                templatePath: config.templateProjectPath,
                pollIntervalMs: config.renderPollIntervalMs,
                logIntervalMs: config.renderHeartbeatIntervalMs,
                timeoutMs: config.renderTimeoutMs,
            }),
            postProcessor: new PostProcessor(probe, config.trimToleranceSeconds),
            uploader: new TransferUploader(
                new DriveStorageClient(tokens, {
                    chunkSizeBytes: config.uploadChunkSizeBytes,
                    folderId: config.driveFolderId,
                }),
                {
                    chunkMaxAttempts: config.uploadChunkMaxAttempts,
                    chunkRetryDelayMs: config.uploadChunkRetryDelayMs,
                }
            ),
            dispatcher: new NotificationDispatcher(new GmailMessagingTransport(tokens), {
                senderAddress: config.senderAddress,
                emailSubject: config.emailSubject,
            }),
            mediaProbe: probe,
            previews,
            player,
            errorService: new PipelineErrorService(),
        },
        {
            inputPath: config.inputVideoPath,
            outputDir: config.outputDir,
            codec: createCodecSettings(config),
            attachMaxAttempts: config.attachMaxAttempts,
            attachRetryDelayMs: config.attachRetryDelayMs,
            fallbackDurationSeconds: config.fallbackDurationSeconds,
            statusIntervalMs: config.statusIntervalMs,
        }
    );

    const wizard = new KioskWizard(orchestrator, config.carrierGateways);
    const loop = new KioskLoop(player, {
        playbackPollIntervalMs: config.playbackPollIntervalMs,
        keepAliveIntervalMs: config.keepAliveIntervalMs,
        onKeepAlive: () => {
            previews.revive();
        },
    });

    return {
        orchestrator,
        wizard,
        loop,
        shutdown: () => {
            loop.stop();
            wizard.dispose();
            orchestrator.shutdown();
        },
    };
}
