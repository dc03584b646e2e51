import { resetLocalAuthConfig } from '../src/constants/Config';
import { IosLocalAuth } from '../src/platform/ios/IosLocalAuth';
import {
    LAErrorCode,
    LAPolicy,
    laError,
    type EvaluatePolicyReply,
    type LAContext,
    type PolicyEvaluation,
} from '../src/platform/ios/laContext';
import type { AuthOutcome } from '../src/types/localAuth';
import { immediate } from '../src/utils/resultGuard';

// --- Fakes ---
interface Evaluation {
    policy: LAPolicy;
    reason: string;
    reply: EvaluatePolicyReply;
}

class FakeContext implements LAContext {
    localizedCancelTitle?: string;
    localizedFallbackTitle?: string;
    evaluations: Evaluation[] = [];

    constructor(private readonly results: Record<LAPolicy, PolicyEvaluation>) {}

    async canEvaluatePolicy(policy: LAPolicy): Promise<PolicyEvaluation> {
        return this.results[policy];
    }

    evaluatePolicy(policy: LAPolicy, reason: string, reply: EvaluatePolicyReply): void {
        this.evaluations.push({ policy, reason, reply });
    }
}

const ENROLLED: PolicyEvaluation = { canEvaluate: true };
const NOT_ENROLLED: PolicyEvaluation = { canEvaluate: false, error: laError(LAErrorCode.biometryNotEnrolled) };
const PASSCODE_SET: PolicyEvaluation = { canEvaluate: true };
const NO_PASSCODE: PolicyEvaluation = { canEvaluate: false, error: laError(LAErrorCode.passcodeNotSet) };

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('IosLocalAuth', () => {

    let contexts: FakeContext[];
    let onResult: jest.Mock<void, [AuthOutcome]>;

    const create = (biometrics: PolicyEvaluation, passcode: PolicyEvaluation) =>
        new IosLocalAuth({
            createContext: () => {
                const context = new FakeContext({
                    [LAPolicy.deviceOwnerAuthenticationWithBiometrics]: biometrics,
                    [LAPolicy.deviceOwnerAuthentication]: passcode,
                });
                contexts.push(context);
                return context;
            },
            dispatch: immediate,
        });

    const lastEvaluation = (): Evaluation => {
        const evaluation = contexts[contexts.length - 1]?.evaluations[0];
        if (!evaluation) throw new Error('no policy was evaluated');
        return evaluation;
    };

    beforeEach(() => {
        resetLocalAuthConfig();
        contexts = [];
        onResult = jest.fn<void, [AuthOutcome]>();
    });

    describe('checkAvailability', () => {
        it.each([
            [ENROLLED, PASSCODE_SET, true, true, true],
            [NOT_ENROLLED, PASSCODE_SET, false, true, true],
            [ENROLLED, NO_PASSCODE, true, false, true],
            [NOT_ENROLLED, NO_PASSCODE, false, false, false],
        ])('case %#', async (biometrics, passcode, biometricsAvailable, deviceCredentialsAvailable, overallAvailable) => {
            await expect(create(biometrics, passcode).checkAvailability()).resolves.toEqual({
                biometricsAvailable,
                deviceCredentialsAvailable,
                overallAvailable,
            });
        });

        it('does not trust a positive answer that reports no enrollment', async () => {
            const capableOnly: PolicyEvaluation = { canEvaluate: true, error: laError(LAErrorCode.biometryNotEnrolled) };

            const result = await create(capableOnly, PASSCODE_SET).checkAvailability();

            expect(result.biometricsAvailable).toBe(false);
            expect(result.overallAvailable).toBe(true);
        });

        it('treats a throwing context as unavailable', async () => {
            const auth = new IosLocalAuth({
                createContext: () => ({
                    canEvaluatePolicy: async () => {
                        throw new Error('context invalidated');
                    },
                    evaluatePolicy: () => undefined,
                }),
            });

            await expect(auth.checkAvailability()).resolves.toEqual({
                biometricsAvailable: false,
                deviceCredentialsAvailable: false,
                overallAvailable: false,
            });
        });

        it('reports nothing available when the context cannot be created', async () => {
            const auth = new IosLocalAuth({
                createContext: () => {
                    throw new Error('no LocalAuthentication');
                },
            });

            await expect(auth.checkAvailability()).resolves.toEqual({
                biometricsAvailable: false,
                deviceCredentialsAvailable: false,
                overallAvailable: false,
            });
        });
    });

    describe('authenticate', () => {
        it('prefers the biometric policy', async () => {
            create(ENROLLED, PASSCODE_SET).authenticate({}, onResult);
            await flush();

            expect(lastEvaluation().policy).toBe(LAPolicy.deviceOwnerAuthenticationWithBiometrics);
            expect(lastEvaluation().reason).toBe('Please authenticate to continue');
        });

        it('offers the passcode alongside biometrics when asked to', async () => {
            create(ENROLLED, PASSCODE_SET).authenticate({ allowDeviceCredentialFallback: true }, onResult);
            await flush();

            expect(lastEvaluation().policy).toBe(LAPolicy.deviceOwnerAuthentication);
        });

        it('falls back to the passcode when biometrics are not enrolled', async () => {
            create(NOT_ENROLLED, PASSCODE_SET).authenticate({ subtitle: 'Unlock your notes' }, onResult);
            await flush();

            expect(lastEvaluation().policy).toBe(LAPolicy.deviceOwnerAuthentication);
            expect(lastEvaluation().reason).toBe('Unlock your notes');
        });

        it('fails with the OS description when nothing can be evaluated', async () => {
            create(NOT_ENROLLED, NO_PASSCODE).authenticate({}, onResult);
            await flush();

            expect(contexts[0]?.evaluations).toHaveLength(0);
            expect(onResult).toHaveBeenCalledWith({ status: 'failure', reason: 'Passcode not set.' });
        });

        it('fails with the default reason when the OS gives none', async () => {
            create({ canEvaluate: false }, { canEvaluate: false }).authenticate({}, onResult);
            await flush();

            expect(onResult).toHaveBeenCalledWith({ status: 'failure', reason: 'Authentication not available' });
        });

        it('resolves a success exactly once', async () => {
            create(ENROLLED, PASSCODE_SET).authenticate({}, onResult);
            await flush();

            lastEvaluation().reply(true);
            lastEvaluation().reply(false, laError(LAErrorCode.systemCancel));

            expect(onResult).toHaveBeenCalledTimes(1);
            expect(onResult).toHaveBeenCalledWith({ status: 'success' });
        });

        it('reports a cancel with its description', async () => {
            create(ENROLLED, PASSCODE_SET).authenticate({}, onResult);
            await flush();

            lastEvaluation().reply(false, laError(LAErrorCode.userCancel));

            expect(onResult).toHaveBeenCalledWith({ status: 'failure', reason: 'Canceled by user.' });
        });

        it('reports a bare failure with the default message', async () => {
            create(ENROLLED, PASSCODE_SET).authenticate({}, onResult);
            await flush();

            lastEvaluation().reply(false);

            expect(onResult).toHaveBeenCalledWith({ status: 'failure', reason: 'Authentication failed' });
        });

        it('sets the cancel and fallback titles on the context', async () => {
            create(ENROLLED, PASSCODE_SET).authenticate({ fallbackButtonText: 'Use passcode' }, onResult);
            await flush();

            const context = contexts[contexts.length - 1];
            expect(context?.localizedCancelTitle).toBe('Cancel');
            expect(context?.localizedFallbackTitle).toBe('Use passcode');
        });

        it('turns a failing context factory into a failure', async () => {
            const auth = new IosLocalAuth({
                createContext: () => {
                    throw new Error('LocalAuthentication unavailable');
                },
                dispatch: immediate,
            });

            auth.authenticate({}, onResult);
            await flush();

            expect(onResult).toHaveBeenCalledWith({ status: 'failure', reason: 'LocalAuthentication unavailable' });
        });
    });
});
