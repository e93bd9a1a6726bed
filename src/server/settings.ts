// Client configuration, section "bsl"
export interface Settings {
    // Common module names whose methods run with elevated rights
    privilegedModules: string[];
    // Index every module file under the workspace folders on startup
    scanWorkspace: boolean;
}

export const DEFAULT_SETTINGS: Settings = {
    privilegedModules: [],
    scanWorkspace: true
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Settings as sent by the client are untyped; unknown or ill-typed fields fall back to defaults
export function normalizeSettings(raw: unknown): Settings {
    if (!isRecord(raw)) {
        return { ...DEFAULT_SETTINGS, privilegedModules: [...DEFAULT_SETTINGS.privilegedModules] };
    }

    const privilegedModules = Array.isArray(raw.privilegedModules)
        ? raw.privilegedModules
            .filter((name): name is string => typeof name === 'string')
            .map(name => name.trim())
            .filter(name => name.length > 0)
        : [...DEFAULT_SETTINGS.privilegedModules];

    const scanWorkspace = typeof raw.scanWorkspace === 'boolean'
        ? raw.scanWorkspace
        : DEFAULT_SETTINGS.scanWorkspace;

    return { privilegedModules, scanWorkspace };
}
