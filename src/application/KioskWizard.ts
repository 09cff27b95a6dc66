import { CarrierGateways, ContactInfo, createContactInfo, isValidEmail, isValidPhone } from '../domain/entities/ContactInfo';
import { PipelineRun } from '../domain/entities/PipelineRun';
import { ReadonlyObservable } from '../infrastructure/state/ObservableValue';

export type WizardStep = 'email' | 'phone' | 'rating' | 'sending' | 'sent' | 'failed';

/**
 * What the wizard needs from the pipeline.
 */
export interface WizardPipeline {
    readonly run: ReadonlyObservable<PipelineRun>;
    isRenderComplete(): boolean;
    contactCaptured(contact: ContactInfo): void;
    consentGiven(): void;
}

export const MAX_RATING = 5;

/**
 * KioskWizard walks the visitor through email → phone → rating and gates the "Send Clip" action.
 */
export class KioskWizard {
    private step: WizardStep = 'email';
    private email?: string;
    private rating = 0;
    private readonly unsubscribe: () => void;

    constructor(
        private readonly pipeline: WizardPipeline,
        private readonly gateways: CarrierGateways
    ) {
        this.unsubscribe = pipeline.run.subscribe((run) => this.onRunChanged(run));
    }

    get currentStep(): WizardStep {
        return this.step;
    }

    get currentRating(): number {
        return this.rating;
    }

    /**
     * @returns false when the address is invalid (the step does not change)
     */
    submitEmail(value: string): boolean {
        this.assertStep('email');
        if (!isValidEmail(value)) {
            return false;
        }
        this.email = value.trim();
        this.step = 'phone';
        return true;
    }

    /**
     * Blank input skips SMS delivery.
     */
    submitPhone(value: string): boolean {
        this.assertStep('phone');
        const phone = value.trim();
        if (phone && !isValidPhone(phone)) {
            return false;
        }
        if (!this.email) {
            throw new Error('Email must be captured before the phone number');
        }

        this.pipeline.contactCaptured(createContactInfo(this.email, phone || undefined, this.gateways));
        this.step = 'rating';
        return true;
    }

    setRating(stars: number): boolean {
        this.assertStep('rating');
        if (!Number.isInteger(stars) || stars < 1 || stars > MAX_RATING) {
            return false;
        }
        this.rating = stars;
        return true;
    }

    /**
     * "Send Clip" is enabled only with a rating and a finished render.
     */
    canSendClip(): boolean {
        return this.step === 'rating' && this.rating > 0 && this.pipeline.isRenderComplete();
    }

    sendClip(): boolean {
        if (!this.canSendClip()) {
            return false;
        }
        this.pipeline.consentGiven();
        this.step = 'sending';
        return true;
    }

    dispose(): void {
        this.unsubscribe();
    }

    private onRunChanged(run: PipelineRun): void {
        if (this.step !== 'sending') {
            return;
        }
        if (run.state === 'delivered') {
            this.step = 'sent';
        } else if (run.state === 'failed') {
            this.step = 'failed';
        }
    }

    private assertStep(expected: WizardStep): void {
        if (this.step !== expected) {
            throw new Error(`Wizard is at "${this.step}", not "${expected}"`);
        }
    }
}
