export interface OutgoingMessage {
    from: string;
    to: string;
    subject: string;
    body: string;
}

/**
 * Port for sending a message. Used for both email and email-to-SMS gateway addresses.
 * Implementations: GmailMessagingTransport
 */
export interface IMessagingTransport {
    send(message: OutgoingMessage): Promise<void>;
}
