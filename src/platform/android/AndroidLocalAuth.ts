import { getLocalAuthConfig, resolvePromptConfiguration } from '../../constants/Config';
import {
    createAvailabilityResult,
    type AuthResultHandler,
    type AvailabilityResult,
    type LocalAuthPlatform,
    type PromptConfiguration,
} from '../../types/localAuth';
import { errorMessage, logger } from '../../utils/logger';
import { createResultGuard, mainQueue, type Dispatcher, type ResultGuard } from '../../utils/resultGuard';
import {
    Authenticators,
    BiometricStatus,
    type BiometricManager,
    type BiometricPromptHost,
} from './biometricManager';
import { buildPromptInfo, selectCredentialStrategy } from './credentialStrategy';

const TAG = '[LocalAuth:android]';

export interface AndroidLocalAuthOptions {
    manager: BiometricManager;
    prompt: BiometricPromptHost;
    sdkInt: number;
    dispatch?: Dispatcher;
}

export class AndroidLocalAuth implements LocalAuthPlatform {
    readonly platform = 'android';

    private readonly manager: BiometricManager;
    private readonly prompt: BiometricPromptHost;
    private readonly sdkInt: number;
    private readonly dispatch: Dispatcher;

    constructor(options: AndroidLocalAuthOptions) {
        this.manager = options.manager;
        this.prompt = options.prompt;
        this.sdkInt = options.sdkInt;
        this.dispatch = options.dispatch ?? mainQueue;
    }

    /**
     * Strong biometrics count only when enrolled; the device credential only
     * when a PIN, pattern or password is set.
     */
    public async checkAvailability(): Promise<AvailabilityResult> {
        const [biometrics, deviceCredentials] = await Promise.all([
            this.canAuthenticate(Authenticators.BIOMETRIC_STRONG),
            this.canAuthenticate(Authenticators.DEVICE_CREDENTIAL),
        ]);
        return createAvailabilityResult(biometrics, deviceCredentials);
    }

    public authenticate(config: PromptConfiguration, onResult: AuthResultHandler): void {
        const guard = createResultGuard(onResult, this.dispatch, TAG);
        this.start(config, guard).catch((error: unknown) => {
            logger.safeError(`${TAG} Could not start authentication:`, error);
            guard.fail(errorMessage(error));
        });
    }

    private async canAuthenticate(authenticators: number): Promise<boolean> {
        try {
            const status = await this.manager.canAuthenticate(authenticators);
            return status === BiometricStatus.SUCCESS;
        } catch (e) {
            logger.warn(`${TAG} canAuthenticate(${authenticators}) failed:`, e);
            return false;
        }
    }

    private async start(config: PromptConfiguration, guard: ResultGuard): Promise<void> {
        const resolved = resolvePromptConfiguration(config, true);
        const availability = await this.checkAvailability();
        const strategy = selectCredentialStrategy(this.sdkInt);
        const promptInfo = buildPromptInfo(strategy, availability, resolved);

        if (!promptInfo) {
            logger.log(`${TAG} No authenticator available, not showing a prompt`);
            guard.fail(getLocalAuthConfig().notAvailableMessage);
            return;
        }

        logger.debug(`${TAG} API ${this.sdkInt}, using ${strategy}`);

        this.dispatch(() => {
            try {
                this.prompt.authenticate(promptInfo, {
                    onAuthenticationError: (errorCode, errString) => {
                        logger.error(`${TAG} Authentication error ${errorCode}: ${errString}`);
                        guard.fail(errString);
                    },
                    onAuthenticationSucceeded: () => {
                        logger.log(`${TAG} Authentication succeeded`);
                        guard.succeed();
                    },
                    onAuthenticationFailed: () => {
                        logger.log(`${TAG} Not recognized, prompt stays open`);
                    },
                });
            } catch (e) {
                logger.safeError(`${TAG} BiometricPrompt threw:`, e);
                guard.fail(errorMessage(e));
            }
        });
    }
}
