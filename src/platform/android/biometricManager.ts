/**
 * TypeScript view of androidx.biometric: the authenticator flags, the status
 * codes of BiometricManager.canAuthenticate and the BiometricPrompt callbacks.
 */

export const Authenticators = {
    BIOMETRIC_STRONG: 0x000f,
    BIOMETRIC_WEAK: 0x00ff,
    DEVICE_CREDENTIAL: 0x8000,
} as const;

export enum BiometricStatus {
    SUCCESS = 0,
    ERROR_HW_UNAVAILABLE = 1,
    ERROR_NONE_ENROLLED = 11,
    ERROR_NO_HARDWARE = 12,
    ERROR_SECURITY_UPDATE_REQUIRED = 15,
    ERROR_UNSUPPORTED = -2,
    STATUS_UNKNOWN = -1,
}

export enum BiometricPromptError {
    HW_UNAVAILABLE = 1,
    UNABLE_TO_PROCESS = 2,
    TIMEOUT = 3,
    NO_SPACE = 4,
    CANCELED = 5,
    LOCKOUT = 7,
    VENDOR = 8,
    LOCKOUT_PERMANENT = 9,
    USER_CANCELED = 10,
    NO_BIOMETRICS = 11,
    HW_NOT_PRESENT = 12,
    NEGATIVE_BUTTON = 13,
    NO_DEVICE_CREDENTIAL = 14,
}

export interface BiometricManager {
    canAuthenticate(authenticators: number): Promise<BiometricStatus>;
}

interface PromptInfoBase {
    title: string;
    subtitle: string;
    confirmationRequired: boolean;
    /** Required by the OS whenever the device credential is not offered. */
    negativeButtonText?: string;
}

/** API 30+: setAllowedAuthenticators(flags). */
export interface AllowedAuthenticatorsPromptInfo extends PromptInfoBase {
    kind: 'allowed-authenticators';
    allowedAuthenticators: number;
}

/** API 28-29: the deprecated setDeviceCredentialAllowed(boolean). */
export interface DeviceCredentialAllowedPromptInfo extends PromptInfoBase {
    kind: 'device-credential-allowed';
    deviceCredentialAllowed: boolean;
}

export type PromptInfo = AllowedAuthenticatorsPromptInfo | DeviceCredentialAllowedPromptInfo;

export interface AuthenticationCallback {
    onAuthenticationError(errorCode: number, errString: string): void;
    onAuthenticationSucceeded(): void;
    /** Not recognized; the prompt stays open for another attempt. */
    onAuthenticationFailed(): void;
}

export interface BiometricPromptHost {
    authenticate(promptInfo: PromptInfo, callback: AuthenticationCallback): void;
}

export function offersDeviceCredential(promptInfo: PromptInfo): boolean {
    if (promptInfo.kind === 'allowed-authenticators') {
        return (promptInfo.allowedAuthenticators & Authenticators.DEVICE_CREDENTIAL) !== 0;
    }
    return promptInfo.deviceCredentialAllowed;
}
