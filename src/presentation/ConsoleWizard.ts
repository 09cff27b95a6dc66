import readline from 'readline/promises';
import { Readable, Writable } from 'stream';
import { KioskWizard, WizardStep } from '../application/KioskWizard';
import { PipelineOrchestrator } from '../application/PipelineOrchestrator';
import { EnhanceStatus } from '../application/EnhanceProgressEstimator';
import { UploadProgress } from '../domain/entities/UploadProgress';
import { PipelineErrorService } from '../application/services/PipelineErrorService';

export const SENT_MESSAGE = 'Sent! Check email & SMS.';

export function formatEnhanceStatus(status: EnhanceStatus): string {
    switch (status.phase) {
        case 'complete':
            return "It's complete";
        case 'failed':
            return 'Enhancement failed';
        default:
            return `Enhancing: ${status.percent}%`;
    }
}

export function formatUploadStatus(progress: UploadProgress): string {
    return `Uploading: ${Math.floor(progress.fractionComplete * 100)}%\n${progress.estimatedSecondsRemaining} seconds remaining`;
}

export interface ConsoleIO {
    input: Readable;
    output: Writable;
}

/**
 * Terminal front-end for the kiosk wizard.
 */
export class ConsoleWizard {
    private lastEnhanceLine = '';

    constructor(
        private readonly wizard: KioskWizard,
        private readonly orchestrator: PipelineOrchestrator,
        private readonly io: ConsoleIO = { input: process.stdin, output: process.stdout },
        private readonly errorService: PipelineErrorService = new PipelineErrorService()
    ) { }

    async run(): Promise<WizardStep> {
        const rl = readline.createInterface({ input: this.io.input, output: this.io.output });
        const stopEnhanceUpdates = this.orchestrator.onEnhanceStatus((status) => this.printEnhanceStatus(status));

        try {
            while (this.wizard.currentStep === 'email') {
                if (!this.wizard.submitEmail(await rl.question('Email: '))) {
                    this.print('Please enter a valid email address.');
                }
            }

            while (this.wizard.currentStep === 'phone') {
                if (!this.wizard.submitPhone(await rl.question('Phone (10 digits, blank to skip): '))) {
                    this.print('Phone number must be exactly 10 digits.');
                }
            }

            while (this.wizard.currentRating === 0) {
                if (!this.wizard.setRating(Number(await rl.question('Rate your experience (1-5): ')))) {
                    this.print('Please choose 1 to 5 stars.');
                }
            }

            if (!this.orchestrator.isRenderComplete()) {
                this.print('Waiting for your clip to finish enhancing...');
            }
            const ready = await this.orchestrator.run.waitFor((r) => r.state === 'ready_for_upload' || r.state === 'failed');
            if (ready.state === 'failed') {
                this.print(ready.failure?.displayMessage ?? this.errorService.getFriendlyErrorMessage(undefined));
                return this.wizard.currentStep;
            }

            await rl.question('Press Enter to send your clip ');
            this.wizard.sendClip();

            const stopUploadUpdates = this.orchestrator.onUploadStatus((progress) => this.print(formatUploadStatus(progress)));
            const settled = await this.orchestrator.whenSettled();
            stopUploadUpdates();

            this.print(settled.state === 'delivered'
                ? SENT_MESSAGE
                : settled.failure?.displayMessage ?? this.errorService.getFriendlyErrorMessage(undefined));
            return this.wizard.currentStep;
        } finally {
            stopEnhanceUpdates();
            rl.close();
        }
    }

    private printEnhanceStatus(status: EnhanceStatus): void {
        const line = formatEnhanceStatus(status);
        if (line !== this.lastEnhanceLine) {
            this.lastEnhanceLine = line;
            this.print(line);
        }
    }

    private print(text: string): void {
        this.io.output.write(`${text}\n`);
    }
}
