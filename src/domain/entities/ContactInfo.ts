/**
 * Carrier name → email-to-SMS gateway suffix (e.g. `@vtext.com`).
 */
export type CarrierGateways = Readonly<Record<string, string>>;

export const DEFAULT_CARRIER_GATEWAYS: CarrierGateways = {
    ATT: '@txt.att.net',
    Verizon: '@vtext.com',
    TMobile: '@tmomail.net',
    Sprint: '@messaging.sprint.com',
};

/**
 * ContactInfo captured by the wizard and consumed by the NotificationDispatcher.
 */
export interface ContactInfo {
    readonly email: string;
    readonly phoneNumber?: string;
    /** One address per known carrier gateway, in gateway order */
    readonly smsTargets: readonly string[];
}

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const PHONE_PATTERN = /^\d{10}$/;

export function isValidEmail(email: string): boolean {
    return EMAIL_PATTERN.test(email.trim());
}

export function isValidPhone(phone: string): boolean {
    return PHONE_PATTERN.test(phone.trim());
}

/**
 * Builds `{number}{suffix}` for every gateway. The carrier is unknown, so all of them are used.
 */
export function buildSmsTargets(phoneNumber: string, gateways: CarrierGateways): string[] {
    return Object.values(gateways).map((suffix) => `${phoneNumber}${suffix}`);
}

export function createContactInfo(
    email: string,
    phoneNumber: string | undefined,
    gateways: CarrierGateways = DEFAULT_CARRIER_GATEWAYS
): ContactInfo {
    const trimmedEmail = email.trim();
    if (!isValidEmail(trimmedEmail)) {
        throw new Error(`Invalid email address: ${email}`);
    }

    const trimmedPhone = phoneNumber?.trim();
    if (!trimmedPhone) {
        return Object.freeze({ email: trimmedEmail, smsTargets: Object.freeze([]) });
    }
    if (!isValidPhone(trimmedPhone)) {
        throw new Error('Phone number must be exactly 10 digits');
    }

    return Object.freeze({
        email: trimmedEmail,
        phoneNumber: trimmedPhone,
        smsTargets: Object.freeze(buildSmsTargets(trimmedPhone, gateways)),
    });
}
