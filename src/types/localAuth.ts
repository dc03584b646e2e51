/**
 * Shared contract between the platform shims and the application.
 */

export interface AvailabilityResult {
    readonly biometricsAvailable: boolean;
    readonly deviceCredentialsAvailable: boolean;
    readonly overallAvailable: boolean;
}

/** Shape handed to the application shell. */
export interface AvailabilityReport {
    biometrics: boolean;
    deviceCredentials: boolean;
    available: boolean;
}

export type AuthOutcome =
    | { status: 'success' }
    | { status: 'failure'; reason: string };

export type AuthResultHandler = (outcome: AuthOutcome) => void;

export interface PromptConfiguration {
    title?: string;
    subtitle?: string;
    /** Android only. */
    confirmationRequired?: boolean;
    /** Implicitly on for Android, opt-in on iOS. */
    allowDeviceCredentialFallback?: boolean;
    cancelButtonText?: string;
    /** iOS only. */
    fallbackButtonText?: string;
}

export interface ResolvedPromptConfiguration {
    title: string;
    subtitle: string;
    confirmationRequired: boolean;
    allowDeviceCredentialFallback: boolean;
    cancelButtonText: string;
    fallbackButtonText?: string;
}

export interface LocalAuthPlatform {
    readonly platform: string;
    checkAvailability(): Promise<AvailabilityResult>;
    authenticate(config: PromptConfiguration, onResult: AuthResultHandler): void;
}

export function createAvailabilityResult(
    biometricsAvailable: boolean,
    deviceCredentialsAvailable: boolean
): AvailabilityResult {
    return Object.freeze({
        biometricsAvailable,
        deviceCredentialsAvailable,
        overallAvailable: biometricsAvailable || deviceCredentialsAvailable,
    });
}

export function toAvailabilityReport(result: AvailabilityResult): AvailabilityReport {
    return {
        biometrics: result.biometricsAvailable,
        deviceCredentials: result.deviceCredentialsAvailable,
        available: result.overallAvailable,
    };
}
