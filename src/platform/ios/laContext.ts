/**
 * TypeScript view of the LocalAuthentication framework's LAContext.
 */

export enum LAPolicy {
    deviceOwnerAuthenticationWithBiometrics = 1,
    deviceOwnerAuthentication = 2,
}

export enum LAErrorCode {
    authenticationFailed = -1,
    userCancel = -2,
    userFallback = -3,
    systemCancel = -4,
    passcodeNotSet = -5,
    biometryNotAvailable = -6,
    biometryNotEnrolled = -7,
    biometryLockout = -8,
    appCancel = -9,
    invalidContext = -10,
    notInteractive = -1004,
}

export interface LAError {
    code: LAErrorCode;
    localizedDescription: string;
}

export interface PolicyEvaluation {
    canEvaluate: boolean;
    error?: LAError;
}

export type EvaluatePolicyReply = (success: boolean, error?: LAError) => void;

export interface LAContext {
    localizedCancelTitle?: string;
    localizedFallbackTitle?: string;
    canEvaluatePolicy(policy: LAPolicy): Promise<PolicyEvaluation>;
    evaluatePolicy(policy: LAPolicy, localizedReason: string, reply: EvaluatePolicyReply): void;
}

export type LAContextFactory = () => LAContext;

const DESCRIPTIONS: Record<LAErrorCode, string> = {
    [LAErrorCode.authenticationFailed]: 'Application retry limit exceeded.',
    [LAErrorCode.userCancel]: 'Canceled by user.',
    [LAErrorCode.userFallback]: 'Fallback authentication mechanism selected.',
    [LAErrorCode.systemCancel]: 'Canceled by the system.',
    [LAErrorCode.passcodeNotSet]: 'Passcode not set.',
    [LAErrorCode.biometryNotAvailable]: 'Biometry is not available on this device.',
    [LAErrorCode.biometryNotEnrolled]: 'No identities are enrolled.',
    [LAErrorCode.biometryLockout]: 'Biometry is locked out.',
    [LAErrorCode.appCancel]: 'Canceled by the application.',
    [LAErrorCode.invalidContext]: 'The authentication context is invalid.',
    [LAErrorCode.notInteractive]: 'Authentication UI could not be shown.',
};

export function laError(code: LAErrorCode, localizedDescription: string = DESCRIPTIONS[code]): LAError {
    return { code, localizedDescription };
}
