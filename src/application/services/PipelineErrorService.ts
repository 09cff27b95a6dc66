import { PipelineFailure } from '../../domain/entities/PipelineRun';
import { isPipelineError } from '../../domain/errors/PipelineError';

/**
 * Turns stage failures into what the kiosk screen shows.
 */
export class PipelineErrorService {
    /**
     * Builds the failure record stored on the pipeline run.
     */
    describe(error: unknown): PipelineFailure {
        const message = error instanceof Error ? error.message : String(error);
        return {
            code: isPipelineError(error) ? error.code : 'Unknown',
            message,
            displayMessage: this.getFriendlyErrorMessage(error),
        };
    }

    /**
     * Converts technical failures to user-friendly ones.
     */
    getFriendlyErrorMessage(error: unknown): string {
        if (!isPipelineError(error)) {
            return 'Something went wrong. Please ask a staff member for help.';
        }
        switch (error.code) {
            case 'RenderEngineMissing':
                return 'The enhancement software is not installed on this kiosk. Please ask a staff member for help.';
            case 'AttachExhausted':
                return 'The enhancement engine did not start. Please ask a staff member for help.';
            case 'ProjectUnavailable':
                return 'The enhancement template could not be loaded. Please ask a staff member for help.';
            case 'RenderFailed':
            case 'RenderTimeout':
                return 'Enhancing your clip failed. Please try recording again.';
            case 'UploadInterrupted':
                return 'The upload was interrupted. Please check the network connection and try again.';
            case 'NotificationFailure':
                return 'We could not reach one of your contacts.';
        }
    }
}
