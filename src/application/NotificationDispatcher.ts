import { ContactInfo } from '../domain/entities/ContactInfo';
import { DeliveryOutcome } from '../domain/entities/PipelineRun';
import { IMessagingTransport, OutgoingMessage } from '../domain/ports/IMessagingTransport';
import { NotificationFailureError } from '../domain/errors/PipelineError';

export interface NotificationDispatcherOptions {
    senderAddress: string;
    emailSubject?: string;
}

/**
 * NotificationDispatcher fans the link out to the email recipient and every SMS gateway address.
 * Each send stands alone; a failed recipient is logged and reported in the outcome list.
 */
export class NotificationDispatcher {
    private readonly emailSubject: string;

    constructor(
        private readonly transport: IMessagingTransport,
        private readonly options: NotificationDispatcherOptions
    ) {
        if (!options.senderAddress) {
            throw new Error('NotificationDispatcher requires a sender address');
        }
        this.emailSubject = options.emailSubject ?? 'Your Video from Pod';
    }

    async deliver(contact: ContactInfo, resultReference: string): Promise<DeliveryOutcome[]> {
        if (!resultReference.trim()) {
            throw new Error('Cannot deliver without a result reference');
        }

        const sends: Array<{ channel: DeliveryOutcome['channel']; message: OutgoingMessage }> = [
            {
                channel: 'email',
                message: {
                    from: this.options.senderAddress,
                    to: contact.email,
                    subject: this.emailSubject,
                    body: `🎬 Here's your clip:\n${resultReference}`,
                },
            },
            ...contact.smsTargets.map((to) => ({
                channel: 'sms' as const,
                message: {
                    from: this.options.senderAddress,
                    to,
                    subject: '',
                    body: `Your video link: ${resultReference}`,
                },
            })),
        ];

        console.log(`[Notify] Delivering link to ${sends.length} recipient(s)...`);
        const outcomes = await Promise.all(sends.map(({ channel, message }) => this.sendOne(channel, message)));

        const delivered = outcomes.filter((outcome) => outcome.delivered).length;
        console.log(`[Notify] ${delivered}/${outcomes.length} message(s) sent`);
        return outcomes;
    }

    private async sendOne(channel: DeliveryOutcome['channel'], message: OutgoingMessage): Promise<DeliveryOutcome> {
        try {
            await this.transport.send(message);
            console.log(`[Notify] ${channel === 'email' ? 'Email' : 'SMS'} sent to ${message.to}`);
            return { recipient: message.to, channel, delivered: true };
        } catch (error) {
            const failure = new NotificationFailureError(message.to, error);
            console.error(`[Notify] ❌ ${failure.message}`);
            return { recipient: message.to, channel, delivered: false, error: failure.message };
        }
    }
}
