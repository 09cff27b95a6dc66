import { v4 as uuidv4 } from 'uuid';
import {
    PipelineRun,
    PipelineState,
    advanceRun,
    createPipelineRun,
    failRun,
    hasReached,
    isTerminalState,
} from '../domain/entities/PipelineRun';
import { ContactInfo } from '../domain/entities/ContactInfo';
import { RenderCodecSettings, createRenderJobSpec } from '../domain/entities/RenderJobSpec';
import { UploadProgress } from '../domain/entities/UploadProgress';
import { IRenderEngineSession } from '../domain/ports/IRenderEngine';
import { IMediaProbe } from '../domain/ports/IMediaProbe';
import { IMediaPlayer, NullMediaPlayer } from '../domain/ports/IMediaPlayer';
import { ObservableValue, ReadonlyObservable } from '../infrastructure/state/ObservableValue';
import { AttachClient } from './AttachClient';
import { RenderJobController } from './RenderJobController';
import { PostProcessor } from './PostProcessor';
import { TransferUploader } from './TransferUploader';
import { NotificationDispatcher } from './NotificationDispatcher';
import { PreviewStreamManager } from './PreviewStreamManager';
import { EnhanceProgressEstimator, EnhanceStatus } from './EnhanceProgressEstimator';
import { PipelineErrorService } from './services/PipelineErrorService';

export interface PipelineOrchestratorDependencies {
    attachClient: AttachClient;
    renderController: RenderJobController;
    postProcessor: PostProcessor;
    uploader: TransferUploader;
    dispatcher: NotificationDispatcher;
    mediaProbe: IMediaProbe;
    previews: PreviewStreamManager;
    player?: IMediaPlayer;
    errorService?: PipelineErrorService;
}

export interface PipelineOrchestratorOptions {
    inputPath: string;
    outputDir: string;
    codec?: RenderCodecSettings;
    attachMaxAttempts: number;
    attachRetryDelayMs: number;
    /** Input duration assumed when probing fails (default: 60s) */
    fallbackDurationSeconds?: number;
    /** Cadence of enhance/upload status updates (default: 1000ms) */
    statusIntervalMs?: number;
    runId?: string;
}

/**
 * PipelineOrchestrator runs the capture → enhance → deliver workflow for one clip.
 *
 * The render stage (attach, render, post-process) starts on `start()` and runs in the
 * background. Upload and delivery start only once the render stage has produced an
 * artifact AND the wizard has signalled consent, in whichever order those happen.
 * The orchestrator is the only writer of the pipeline run.
 */
export class PipelineOrchestrator {
    private readonly runState: ObservableValue<PipelineRun>;
    private readonly deps: Required<PipelineOrchestratorDependencies>;
    private readonly statusIntervalMs: number;
    private readonly enhanceListeners = new Set<(status: EnhanceStatus) => void>();
    private readonly uploadListeners = new Set<(progress: UploadProgress) => void>();

    private contact?: ContactInfo;
    private consent = false;
    private renderTask?: Promise<void>;
    private deliveryTask?: Promise<void>;
    private estimator?: EnhanceProgressEstimator;
    private uploadTicker?: NodeJS.Timeout;

    constructor(
        deps: PipelineOrchestratorDependencies,
        private readonly options: PipelineOrchestratorOptions
    ) {
        this.deps = {
            ...deps,
            player: deps.player ?? new NullMediaPlayer(),
            errorService: deps.errorService ?? new PipelineErrorService(),
        };
        this.statusIntervalMs = options.statusIntervalMs ?? 1000;
        this.runState = new ObservableValue(createPipelineRun(options.runId ?? `run_${uuidv4().substring(0, 8)}`));
    }

    get run(): ReadonlyObservable<PipelineRun> {
        return this.runState.asReadonly();
    }

    get state(): PipelineState {
        return this.runState.get().state;
    }

    get enhanceStatus(): EnhanceStatus {
        return this.estimator?.status ?? { phase: 'enhancing', percent: 0 };
    }

    get uploadProgress(): ReadonlyObservable<UploadProgress> {
        return this.deps.uploader.progress;
    }

    /**
     * True once the enhanced clip is ready, whether or not the upload has started.
     */
    isRenderComplete(): boolean {
        return hasReached(this.runState.get(), 'ready_for_upload');
    }

    onEnhanceStatus(listener: (status: EnhanceStatus) => void): () => void {
        this.enhanceListeners.add(listener);
        return () => {
            this.enhanceListeners.delete(listener);
        };
    }

    onUploadStatus(listener: (progress: UploadProgress) => void): () => void {
        this.uploadListeners.add(listener);
        return () => {
            this.uploadListeners.delete(listener);
        };
    }

    /**
     * Starts the background render stage. Returns immediately.
     */
    start(): void {
        if (this.renderTask) {
            throw new Error('Pipeline already started');
        }
        this.renderTask = this.runRenderStage();
    }

    contactCaptured(contact: ContactInfo): void {
        if (this.consent) {
            throw new Error('Contact details cannot change after consent');
        }
        this.contact = contact;
        const smsCount = contact.smsTargets.length;
        console.log(`[${this.runId}] Contact captured: ${contact.email}${smsCount ? ` + ${smsCount} SMS gateway(s)` : ''}`);
    }

    /**
     * Records the user's consent to upload. Acted on immediately if the clip is ready,
     * otherwise as soon as post-processing completes.
     */
    consentGiven(): void {
        if (!this.contact) {
            throw new Error('Contact details must be captured before consent');
        }
        if (this.consent) {
            return;
        }
        this.consent = true;
        console.log(`[${this.runId}] Consent received${this.isRenderComplete() ? '' : ', waiting for the render to finish'}`);
        this.maybeStartDelivery();
    }

    /**
     * Resolves once the run is delivered or failed.
     */
    whenSettled(): Promise<PipelineRun> {
        return this.runState.waitFor((run) => isTerminalState(run.state));
    }

    /**
     * Stops timers and preview processes. Background work is abandoned with the process.
     */
    shutdown(): void {
        this.estimator?.stop();
        this.stopUploadTicker();
        this.deps.previews.stopAll();
        this.deps.player.stop();
    }

    private get runId(): string {
        return this.runState.get().id;
    }

    private async runRenderStage(): Promise<void> {
        const { inputPath, outputDir } = this.options;

        try {
            this.deps.previews.show(inputPath);
            this.deps.player.play(inputPath);
            this.transition('attaching');

            const info = await this.deps.mediaProbe.probe(inputPath);
            const inputDuration = info?.durationSeconds ?? this.options.fallbackDurationSeconds ?? 60;
            this.startEstimator(inputDuration);

            const spec = createRenderJobSpec({
                inputPath,
                outputDir,
                codec: this.options.codec,
                resolution: info?.width && info.height ? { width: info.width, height: info.height } : undefined,
            });

            const session = await this.deps.attachClient.attach(
                this.options.attachMaxAttempts,
                this.options.attachRetryDelayMs
            );

            this.transition('rendering');
            const handle = await this.deps.renderController.submit(session, spec);
            const renderedPath = await this.deps.renderController.awaitCompletion(session, handle, spec);
            await this.releaseSession(session);

            this.transition('post_processing');
            const finalPath = await this.deps.postProcessor.normalize(renderedPath, inputDuration);

            this.deps.previews.show(finalPath);
            this.deps.player.play(finalPath);

            this.transition('ready_for_upload', { artifact: { path: finalPath, durationSeconds: inputDuration } });
            this.estimator?.complete();
            this.maybeStartDelivery();
        } catch (error) {
            this.fail(error);
        }
    }

    private maybeStartDelivery(): void {
        if (!this.consent || this.deliveryTask || this.runState.get().state !== 'ready_for_upload') {
            return;
        }
        this.deliveryTask = this.runDeliveryStage();
    }

    private async runDeliveryStage(): Promise<void> {
        try {
            const { artifact } = this.runState.get();
            const contact = this.contact;
            if (!artifact || !contact) {
                throw new Error('Delivery requires both the enhanced clip and contact details');
            }

            this.transition('uploading');
            this.startUploadTicker();
            await this.deps.uploader.upload(artifact.path);

            const progress = await this.deps.uploader.progress.waitFor((p) => p.done && !!p.resultReference);
            this.publishUploadStatus();
            this.stopUploadTicker();

            const resultReference = progress.resultReference ?? '';
            const deliveries = await this.deps.dispatcher.deliver(contact, resultReference);
            this.transition('delivered', { resultReference, deliveries });
        } catch (error) {
            this.stopUploadTicker();
            this.fail(error);
        }
    }

    private async releaseSession(session: IRenderEngineSession): Promise<void> {
        if (!session.release) {
            return;
        }
        try {
            await session.release();
        } catch (error) {
            console.warn(`[${this.runId}] Render engine release failed:`, error);
        }
    }

    private transition(
        state: Exclude<PipelineState, 'failed'>,
        updates?: Parameters<typeof advanceRun>[2]
    ): void {
        this.runState.update((run) => advanceRun(run, state, updates));
        console.log(`[${this.runId}] Pipeline → ${state}`);
    }

    private fail(error: unknown): void {
        const run = this.runState.get();
        if (isTerminalState(run.state)) {
            console.error(`[${run.id}] Error after pipeline settled:`, error);
            return;
        }

        const failure = this.deps.errorService.describe(error);
        console.error(`[${run.id}] ❌ Pipeline failed in ${run.state}: ${failure.message}`);
        this.runState.set(failRun(run, failure));
        this.estimator?.fail();
    }

    private startEstimator(inputDurationSeconds: number): void {
        this.estimator = new EnhanceProgressEstimator(inputDurationSeconds, { intervalMs: this.statusIntervalMs });
        this.estimator.onStatus((status) => {
            for (const listener of [...this.enhanceListeners]) {
                listener(status);
            }
        });
        this.estimator.start();
    }

    private startUploadTicker(): void {
        this.publishUploadStatus();
        this.uploadTicker = setInterval(() => this.publishUploadStatus(), this.statusIntervalMs);
        this.uploadTicker.unref();
    }

    private stopUploadTicker(): void {
        if (this.uploadTicker) {
            clearInterval(this.uploadTicker);
            this.uploadTicker = undefined;
        }
    }

    private publishUploadStatus(): void {
        const progress = this.deps.uploader.progress.get();
        for (const listener of [...this.uploadListeners]) {
            listener(progress);
        }
    }
}
