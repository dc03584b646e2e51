import type { PromptConfiguration, ResolvedPromptConfiguration } from '../types/localAuth';

export interface LocalAuthConfig {
    defaultTitle: string;
    defaultSubtitle: string;
    defaultCancelButtonText: string;
    notAvailableMessage: string;
    failureMessage: string;
    /** Set to false to mute the bridge's console output. */
    logging: boolean;
}

const DEFAULT_CONFIG: LocalAuthConfig = {
    defaultTitle: 'Authentication',
    defaultSubtitle: 'Please authenticate to continue',
    defaultCancelButtonText: 'Cancel',
    notAvailableMessage: 'Authentication not available',
    failureMessage: 'Authentication failed',
    logging: process.env.EXPO_PUBLIC_LOCAL_AUTH_LOGGING !== 'false',
};

let globalConfig: LocalAuthConfig = { ...DEFAULT_CONFIG };

export function configureLocalAuth(config: Partial<LocalAuthConfig>): void {
    globalConfig = { ...globalConfig, ...config };
}

export function getLocalAuthConfig(): LocalAuthConfig {
    return globalConfig;
}

export function resetLocalAuthConfig(): void {
    globalConfig = { ...DEFAULT_CONFIG };
}

function textOr(value: string | undefined, fallback: string): string {
    return value !== undefined && value.trim().length > 0 ? value : fallback;
}

/**
 * Fill in the caller's prompt options. Blank strings count as missing so the
 * OS prompt never receives an empty title or reason.
 */
export function resolvePromptConfiguration(
    input: PromptConfiguration,
    fallbackAllowedByDefault: boolean
): ResolvedPromptConfiguration {
    const config = getLocalAuthConfig();
    return {
        title: textOr(input.title, config.defaultTitle),
        subtitle: textOr(input.subtitle, config.defaultSubtitle),
        confirmationRequired: input.confirmationRequired ?? false,
        allowDeviceCredentialFallback: input.allowDeviceCredentialFallback ?? fallbackAllowedByDefault,
        cancelButtonText: textOr(input.cancelButtonText, config.defaultCancelButtonText),
        fallbackButtonText: input.fallbackButtonText,
    };
}

/** Failure reasons are never empty. */
export function failureReason(message: string | null | undefined): string {
    return textOr(message ?? undefined, getLocalAuthConfig().failureMessage);
}
