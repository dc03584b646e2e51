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
    LAErrorCode,
    LAPolicy,
    type LAContext,
    type LAContextFactory,
    type PolicyEvaluation,
} from './laContext';

const TAG = '[LocalAuth:ios]';

export interface IosLocalAuthOptions {
    createContext: LAContextFactory;
    dispatch?: Dispatcher;
}

export class IosLocalAuth implements LocalAuthPlatform {
    readonly platform = 'ios';

    private readonly createContext: LAContextFactory;
    private readonly dispatch: Dispatcher;

    constructor(options: IosLocalAuthOptions) {
        this.createContext = options.createContext;
        this.dispatch = options.dispatch ?? mainQueue;
    }

    public async checkAvailability(): Promise<AvailabilityResult> {
        let context: LAContext;
        try {
            context = this.createContext();
        } catch (e) {
            logger.warn(`${TAG} Could not create LAContext:`, e);
            return createAvailabilityResult(false, false);
        }
        const biometrics = await this.evaluate(context, LAPolicy.deviceOwnerAuthenticationWithBiometrics);
        const deviceCredentials = await this.evaluate(context, LAPolicy.deviceOwnerAuthentication);
        return createAvailabilityResult(biometricsUsable(biometrics), deviceCredentials.canEvaluate);
    }

    public authenticate(config: PromptConfiguration, onResult: AuthResultHandler): void {
        const guard = createResultGuard(onResult, this.dispatch, TAG);
        this.start(config, guard).catch((error: unknown) => {
            logger.safeError(`${TAG} Could not start authentication:`, error);
            guard.fail(errorMessage(error));
        });
    }

    private async evaluate(context: LAContext, policy: LAPolicy): Promise<PolicyEvaluation> {
        try {
            return await context.canEvaluatePolicy(policy);
        } catch (e) {
            logger.warn(`${TAG} canEvaluatePolicy(${policy}) failed:`, e);
            return { canEvaluate: false };
        }
    }

    private async start(config: PromptConfiguration, guard: ResultGuard): Promise<void> {
        const resolved = resolvePromptConfiguration(config, false);
        const context = this.createContext();
        context.localizedCancelTitle = resolved.cancelButtonText;
        if (resolved.fallbackButtonText !== undefined) {
            context.localizedFallbackTitle = resolved.fallbackButtonText;
        }
        if (resolved.confirmationRequired) {
            logger.debug(`${TAG} confirmationRequired has no effect on iOS`);
        }

        const biometrics = await this.evaluate(context, LAPolicy.deviceOwnerAuthenticationWithBiometrics);
        const deviceCredentials = await this.evaluate(context, LAPolicy.deviceOwnerAuthentication);

        let policy: LAPolicy;
        if (biometricsUsable(biometrics) && !resolved.allowDeviceCredentialFallback) {
            policy = LAPolicy.deviceOwnerAuthenticationWithBiometrics;
        } else if (deviceCredentials.canEvaluate) {
            policy = LAPolicy.deviceOwnerAuthentication;
        } else if (biometricsUsable(biometrics)) {
            policy = LAPolicy.deviceOwnerAuthenticationWithBiometrics;
        } else {
            const reason = deviceCredentials.error?.localizedDescription ?? getLocalAuthConfig().notAvailableMessage;
            logger.log(`${TAG} No policy can be evaluated: ${reason}`);
            guard.fail(reason);
            return;
        }

        this.dispatch(() => {
            try {
                context.evaluatePolicy(policy, resolved.subtitle, (success, error) => {
                    if (error) {
                        logger.error(`${TAG} Authentication error ${error.code}: ${error.localizedDescription}`);
                        guard.fail(error.localizedDescription);
                    } else if (success) {
                        logger.log(`${TAG} Authentication succeeded`);
                        guard.succeed();
                    } else {
                        guard.fail(getLocalAuthConfig().failureMessage);
                    }
                });
            } catch (e) {
                logger.safeError(`${TAG} evaluatePolicy threw:`, e);
                guard.fail(errorMessage(e));
            }
        });
    }
}

function biometricsUsable(evaluation: PolicyEvaluation): boolean {
    return evaluation.canEvaluate && evaluation.error?.code !== LAErrorCode.biometryNotEnrolled;
}
