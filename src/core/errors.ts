/**
 * Error taxonomy.
 *
 * Validation errors (rule add/update) are returned as values and never thrown
 * across a component boundary. Runtime errors are caught where they happen and
 * turned into state reports or delivery results; the classes exist so that
 * logs and callers can tell them apart by `code`.
 */

export type ErrorCode =
    | 'ConfigError'
    | 'NotConfigured'
    | 'ConnectionError'
    | 'PlaybackUnavailable'
    | 'PushDeliveryFailed'
    | 'DuplicateRuleKey'
    | 'InvalidSoundExtension'
    | 'InvalidRule'
    | 'RuleNotFound';

export class TalkAlertError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = code;
        this.code = code;
    }
}

export class ConfigError extends TalkAlertError {
    constructor(message: string) {
        super('ConfigError', message);
    }
}

export class NotConfiguredError extends TalkAlertError {
    constructor(message: string) {
        super('NotConfigured', message);
    }
}

export class ConnectionError extends TalkAlertError {
    constructor(message: string) {
        super('ConnectionError', message);
    }
}

export class PlaybackUnavailableError extends TalkAlertError {
    constructor(message: string) {
        super('PlaybackUnavailable', message);
    }
}

export class PushDeliveryFailedError extends TalkAlertError {
    constructor(reason: string) {
        super('PushDeliveryFailed', reason);
    }
}

export class DuplicateRuleKeyError extends TalkAlertError {
    readonly senderId: string;

    constructor(senderId: string) {
        super('DuplicateRuleKey', `A rule for sender ${senderId} already exists`);
        this.senderId = senderId;
    }
}

export class InvalidSoundExtensionError extends TalkAlertError {
    readonly soundPath: string;

    constructor(soundPath: string, allowed: readonly string[]) {
        super('InvalidSoundExtension', `Sound file must be one of ${allowed.join(', ')}: "${soundPath}"`);
        this.soundPath = soundPath;
    }
}

export class InvalidRuleError extends TalkAlertError {
    constructor(message: string) {
        super('InvalidRule', message);
    }
}

export class RuleNotFoundError extends TalkAlertError {
    constructor(senderId: string) {
        super('RuleNotFound', `No rule for sender ${senderId}`);
    }
}

export type RuleValidationError =
    | DuplicateRuleKeyError
    | InvalidSoundExtensionError
    | InvalidRuleError
    | RuleNotFoundError;

/**
 * Message of anything thrown.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
