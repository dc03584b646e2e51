import { Platform } from 'react-native';

import { AndroidLocalAuth } from '../platform/android/AndroidLocalAuth';
import { ExpoBiometricManager, ExpoBiometricPrompt } from '../platform/expo/expoAndroid';
import { ExpoAuthContext } from '../platform/expo/expoIos';
import { IosLocalAuth } from '../platform/ios/IosLocalAuth';
import { UnsupportedLocalAuth } from '../platform/unsupported';
import {
    toAvailabilityReport,
    type AuthOutcome,
    type AvailabilityReport,
    type LocalAuthPlatform,
    type PromptConfiguration,
} from '../types/localAuth';

export type LocalAuthCallback = (success: boolean, error: string | null) => void;

export type AuthenticateOptions = PromptConfiguration;

function androidSdkInt(): number {
    return typeof Platform.Version === 'number' ? Platform.Version : Number.parseInt(Platform.Version, 10);
}

/**
 * Pick the shim for the platform the app is running on.
 */
export function createPlatformAuth(): LocalAuthPlatform {
    switch (Platform.OS) {
        case 'android':
            return new AndroidLocalAuth({
                manager: new ExpoBiometricManager(),
                prompt: new ExpoBiometricPrompt(),
                sdkInt: androidSdkInt(),
            });
        case 'ios':
            return new IosLocalAuth({ createContext: () => new ExpoAuthContext() });
        default:
            return new UnsupportedLocalAuth(Platform.OS);
    }
}

export class LocalAuthService {
    private platform: LocalAuthPlatform | null;

    constructor(platform?: LocalAuthPlatform) {
        this.platform = platform ?? null;
    }

    /**
     * Which modalities are enrolled right now. Queried fresh on every call
     * since the user can enroll or remove a fingerprint at any time.
     */
    public async checkAvailability(): Promise<AvailabilityReport> {
        const result = await this.getPlatform().checkAvailability();
        return toAvailabilityReport(result);
    }

    /**
     * Show the system prompt once. The callback fires exactly once:
     * (true, null) on success, (false, reason) otherwise.
     */
    public authenticate(options: AuthenticateOptions, callback: LocalAuthCallback): void {
        this.getPlatform().authenticate(options, (outcome) => {
            if (outcome.status === 'success') {
                callback(true, null);
            } else {
                callback(false, outcome.reason);
            }
        });
    }

    /**
     * Promise flavour of authenticate. Resolves with the outcome, never rejects.
     */
    public authenticateAsync(options: AuthenticateOptions = {}): Promise<AuthOutcome> {
        return new Promise((resolve) => {
            this.getPlatform().authenticate(options, resolve);
        });
    }

    private getPlatform(): LocalAuthPlatform {
        if (!this.platform) {
            this.platform = createPlatformAuth();
        }
        return this.platform;
    }
}

export const localAuthService = new LocalAuthService();
