import axios from 'axios';
import { IMessagingTransport, OutgoingMessage } from '../../domain/ports/IMessagingTransport';
import { AccessTokenProvider } from '../google/AccessTokenProvider';

const SEND_URL = 'https://gmail.googleapis.com/gmail/v1/users/me/messages/send';

/**
 * RFC 2047 encoded-word for header values that are not plain printable ASCII.
 */
export function encodeHeaderValue(value: string): string {
    if (/^[\x20-\x7e]*$/.test(value)) {
        return value;
    }
    return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * Builds a text/plain message with a base64 UTF-8 body and CRLF line endings.
 */
export function buildMimeMessage(message: OutgoingMessage): string {
    const body = Buffer.from(message.body, 'utf-8').toString('base64').match(/.{1,76}/g) ?? [];
    return [
        `To: ${message.to}`,
        `From: ${message.from}`,
        `Subject: ${encodeHeaderValue(message.subject)}`,
        'MIME-Version: 1.0',
        'Content-Type: text/plain; charset="UTF-8"',
        'Content-Transfer-Encoding: base64',
        '',
        ...body,
    ].join('\r\n');
}

/**
 * Sends messages through the Gmail API as the authorised account.
 */
export class GmailMessagingTransport implements IMessagingTransport {
    constructor(
        private readonly tokens: AccessTokenProvider,
        private readonly timeout: number = 30000
    ) { }

    async send(message: OutgoingMessage): Promise<void> {
        const raw = Buffer.from(buildMimeMessage(message), 'utf-8').toString('base64url');

        try {
            await axios.post(
                SEND_URL,
                { raw },
                {
                    headers: {
                        'Authorization': `Bearer ${await this.tokens.getAccessToken()}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: this.timeout,
                }
            );
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status ?? 'network';
                throw new Error(`Gmail send to ${message.to} failed (${status}): ${error.message}`, { cause: error });
            }
            throw error;
        }
    }
}
