/**
 * LAContext port backed by expo-local-authentication.
 */

import * as LocalAuthentication from 'expo-local-authentication';

import { errorMessage } from '../../utils/logger';
import {
    LAErrorCode,
    LAPolicy,
    laError,
    type EvaluatePolicyReply,
    type LAContext,
    type LAError,
    type PolicyEvaluation,
} from '../ios/laContext';

const LA_ERROR_CODES: Record<string, LAErrorCode> = {
    authentication_failed: LAErrorCode.authenticationFailed,
    user_cancel: LAErrorCode.userCancel,
    user_fallback: LAErrorCode.userFallback,
    system_cancel: LAErrorCode.systemCancel,
    passcode_not_set: LAErrorCode.passcodeNotSet,
    not_available: LAErrorCode.biometryNotAvailable,
    not_enrolled: LAErrorCode.biometryNotEnrolled,
    lockout: LAErrorCode.biometryLockout,
    app_cancel: LAErrorCode.appCancel,
    invalid_context: LAErrorCode.invalidContext,
    not_interactive: LAErrorCode.notInteractive,
};

export function toLAError(error: string): LAError {
    const code = LA_ERROR_CODES[error];
    return code === undefined ? laError(LAErrorCode.authenticationFailed, `Authentication error: ${error}`) : laError(code);
}

export class ExpoAuthContext implements LAContext {
    localizedCancelTitle?: string;
    localizedFallbackTitle?: string;

    async canEvaluatePolicy(policy: LAPolicy): Promise<PolicyEvaluation> {
        if (policy === LAPolicy.deviceOwnerAuthentication) {
            const level = await LocalAuthentication.getEnrolledLevelAsync();
            return level >= LocalAuthentication.SecurityLevel.SECRET
                ? { canEvaluate: true }
                : { canEvaluate: false, error: laError(LAErrorCode.passcodeNotSet) };
        }

        const [hasHardware, isEnrolled] = await Promise.all([
            LocalAuthentication.hasHardwareAsync(),
            LocalAuthentication.isEnrolledAsync(),
        ]);
        if (!hasHardware) {
            return { canEvaluate: false, error: laError(LAErrorCode.biometryNotAvailable) };
        }
        if (!isEnrolled) {
            return { canEvaluate: false, error: laError(LAErrorCode.biometryNotEnrolled) };
        }
        return { canEvaluate: true };
    }

    evaluatePolicy(policy: LAPolicy, localizedReason: string, reply: EvaluatePolicyReply): void {
        LocalAuthentication.authenticateAsync({
            promptMessage: localizedReason,
            cancelLabel: this.localizedCancelTitle,
            fallbackLabel: this.localizedFallbackTitle,
            disableDeviceFallback: policy === LAPolicy.deviceOwnerAuthenticationWithBiometrics,
        }).then(
            (result) => {
                if (result.success) {
                    reply(true);
                    return;
                }
                reply(false, toLAError(result.error));
            },
            (error: unknown) => {
                reply(false, laError(LAErrorCode.notInteractive, errorMessage(error)));
            }
        );
    }
}
