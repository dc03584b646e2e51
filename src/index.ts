export {
    LocalAuthService,
    localAuthService,
    createPlatformAuth,
    type AuthenticateOptions,
    type LocalAuthCallback,
} from './services/localAuthService';
export {
    configureLocalAuth,
    getLocalAuthConfig,
    resetLocalAuthConfig,
    type LocalAuthConfig,
} from './constants/Config';
export {
    createAvailabilityResult,
    toAvailabilityReport,
    type AuthOutcome,
    type AuthResultHandler,
    type AvailabilityReport,
    type AvailabilityResult,
    type LocalAuthPlatform,
    type PromptConfiguration,
} from './types/localAuth';
export { AndroidLocalAuth, type AndroidLocalAuthOptions } from './platform/android/AndroidLocalAuth';
export * from './platform/android/biometricManager';
export { selectCredentialStrategy, buildPromptInfo, type CredentialStrategy } from './platform/android/credentialStrategy';
export { IosLocalAuth, type IosLocalAuthOptions } from './platform/ios/IosLocalAuth';
export * from './platform/ios/laContext';
export { UnsupportedLocalAuth } from './platform/unsupported';
export { ExpoBiometricManager, ExpoBiometricPrompt } from './platform/expo/expoAndroid';
export { ExpoAuthContext } from './platform/expo/expoIos';
export { createResultGuard, mainQueue, immediate, type Dispatcher, type ResultGuard } from './utils/resultGuard';
