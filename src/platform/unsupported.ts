import { getLocalAuthConfig } from '../constants/Config';
import {
    createAvailabilityResult,
    type AuthResultHandler,
    type AvailabilityResult,
    type LocalAuthPlatform,
    type PromptConfiguration,
} from '../types/localAuth';
import { logger } from '../utils/logger';
import { createResultGuard, mainQueue, type Dispatcher } from '../utils/resultGuard';

/** Web and any other host without a native authentication prompt. */
export class UnsupportedLocalAuth implements LocalAuthPlatform {
    constructor(
        readonly platform: string,
        private readonly dispatch: Dispatcher = mainQueue
    ) {}

    public async checkAvailability(): Promise<AvailabilityResult> {
        return createAvailabilityResult(false, false);
    }

    public authenticate(_config: PromptConfiguration, onResult: AuthResultHandler): void {
        logger.log(`[LocalAuth] No native authentication on ${this.platform}`);
        createResultGuard(onResult, this.dispatch).fail(getLocalAuthConfig().notAvailableMessage);
    }
}
