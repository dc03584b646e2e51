import type { AvailabilityResult, ResolvedPromptConfiguration } from '../../types/localAuth';
import { Authenticators, type PromptInfo } from './biometricManager';

/** Android 11, the first release that takes BIOMETRIC_STRONG | DEVICE_CREDENTIAL. */
export const COMBINED_AUTHENTICATORS_MIN_SDK = 30;

export type CredentialStrategy = PromptInfo['kind'];

export function selectCredentialStrategy(sdkInt: number): CredentialStrategy {
    return sdkInt >= COMBINED_AUTHENTICATORS_MIN_SDK
        ? 'allowed-authenticators'
        : 'device-credential-allowed';
}

/**
 * Build the prompt for the modalities that are usable right now.
 * Returns null when nothing can be offered.
 */
export function buildPromptInfo(
    strategy: CredentialStrategy,
    availability: AvailabilityResult,
    config: ResolvedPromptConfiguration
): PromptInfo | null {
    const useBiometrics = availability.biometricsAvailable;
    const useCredential = config.allowDeviceCredentialFallback && availability.deviceCredentialsAvailable;

    if (!useBiometrics && !useCredential) {
        return null;
    }

    const base = {
        title: config.title,
        subtitle: config.subtitle,
        confirmationRequired: config.confirmationRequired,
        negativeButtonText: useCredential ? undefined : config.cancelButtonText,
    };

    if (strategy === 'allowed-authenticators') {
        let allowedAuthenticators = 0;
        if (useBiometrics) allowedAuthenticators |= Authenticators.BIOMETRIC_STRONG;
        if (useCredential) allowedAuthenticators |= Authenticators.DEVICE_CREDENTIAL;
        return { ...base, kind: strategy, allowedAuthenticators };
    }

    return { ...base, kind: strategy, deviceCredentialAllowed: useCredential };
}
