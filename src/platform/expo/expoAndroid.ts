/**
 * BiometricManager / BiometricPrompt ports backed by expo-local-authentication.
 */

import * as LocalAuthentication from 'expo-local-authentication';

import { errorMessage } from '../../utils/logger';
import {
    Authenticators,
    BiometricPromptError,
    BiometricStatus,
    offersDeviceCredential,
    type AuthenticationCallback,
    type BiometricManager,
    type BiometricPromptHost,
    type PromptInfo,
} from '../android/biometricManager';

const PROMPT_ERRORS: Record<string, { code: BiometricPromptError; message: string }> = {
    user_cancel: { code: BiometricPromptError.USER_CANCELED, message: 'Authentication canceled by user' },
    system_cancel: { code: BiometricPromptError.CANCELED, message: 'Authentication canceled' },
    app_cancel: { code: BiometricPromptError.CANCELED, message: 'Authentication canceled' },
    lockout: { code: BiometricPromptError.LOCKOUT, message: 'Too many attempts. Try again later.' },
    lockout_permanent: {
        code: BiometricPromptError.LOCKOUT_PERMANENT,
        message: 'Too many attempts. Biometric sensor disabled.',
    },
    timeout: { code: BiometricPromptError.TIMEOUT, message: 'Authentication timed out' },
    no_space: { code: BiometricPromptError.NO_SPACE, message: 'Not enough storage to complete authentication' },
    unable_to_process: { code: BiometricPromptError.UNABLE_TO_PROCESS, message: 'Unable to process authentication' },
    not_enrolled: { code: BiometricPromptError.NO_BIOMETRICS, message: 'No biometrics enrolled' },
    not_available: { code: BiometricPromptError.HW_NOT_PRESENT, message: 'Biometric hardware not available' },
    passcode_not_set: { code: BiometricPromptError.NO_DEVICE_CREDENTIAL, message: 'No device credential set' },
};

export function toPromptError(error: string): { code: BiometricPromptError; message: string } {
    return PROMPT_ERRORS[error] ?? { code: BiometricPromptError.VENDOR, message: `Authentication error: ${error}` };
}

export class ExpoBiometricManager implements BiometricManager {
    async canAuthenticate(authenticators: number): Promise<BiometricStatus> {
        const level = await LocalAuthentication.getEnrolledLevelAsync();

        if ((authenticators & Authenticators.DEVICE_CREDENTIAL) !== 0 && level >= LocalAuthentication.SecurityLevel.SECRET) {
            return BiometricStatus.SUCCESS;
        }

        const biometricBits = authenticators & Authenticators.BIOMETRIC_WEAK;
        if (biometricBits === 0) {
            return BiometricStatus.ERROR_NONE_ENROLLED;
        }

        const required = biometricBits === Authenticators.BIOMETRIC_STRONG
            ? LocalAuthentication.SecurityLevel.BIOMETRIC_STRONG
            : LocalAuthentication.SecurityLevel.BIOMETRIC_WEAK;
        if (level >= required) {
            return BiometricStatus.SUCCESS;
        }

        const hasHardware = await LocalAuthentication.hasHardwareAsync();
        return hasHardware ? BiometricStatus.ERROR_NONE_ENROLLED : BiometricStatus.ERROR_NO_HARDWARE;
    }
}

export function toAuthenticateOptions(promptInfo: PromptInfo): LocalAuthentication.LocalAuthenticationOptions {
    return {
        promptMessage: promptInfo.title,
        promptSubtitle: promptInfo.subtitle,
        requireConfirmation: promptInfo.confirmationRequired,
        cancelLabel: promptInfo.negativeButtonText,
        disableDeviceFallback: !offersDeviceCredential(promptInfo),
        // setDeviceCredentialAllowed admits any enrolled biometric, not only class 3
        biometricsSecurityLevel: promptInfo.kind === 'allowed-authenticators' ? 'strong' : 'weak',
    };
}

/**
 * Expo only reports terminal results, so onAuthenticationFailed is never
 * called from here; retries stay inside the system prompt.
 */
export class ExpoBiometricPrompt implements BiometricPromptHost {
    authenticate(promptInfo: PromptInfo, callback: AuthenticationCallback): void {
        LocalAuthentication.authenticateAsync(toAuthenticateOptions(promptInfo)).then(
            (result) => {
                if (result.success) {
                    callback.onAuthenticationSucceeded();
                    return;
                }
                const { code, message } = toPromptError(result.error);
                callback.onAuthenticationError(code, message);
            },
            (error: unknown) => {
                callback.onAuthenticationError(BiometricPromptError.VENDOR, errorMessage(error));
            }
        );
    }
}
