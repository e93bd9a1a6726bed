import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS, normalizeSettings } from '../../src/server/settings';

describe('normalizeSettings', () => {
    it('falls back to defaults for missing configuration', () => {
        expect(normalizeSettings(undefined)).toEqual(DEFAULT_SETTINGS);
        expect(normalizeSettings(null)).toEqual(DEFAULT_SETTINGS);
        expect(normalizeSettings('bsl')).toEqual(DEFAULT_SETTINGS);
    });

    it('keeps well-typed values', () => {
        expect(normalizeSettings({ privilegedModules: ['CommonUtils'], scanWorkspace: false }))
            .toEqual({ privilegedModules: ['CommonUtils'], scanWorkspace: false });
    });

    it('drops non-string and blank module names', () => {
        expect(normalizeSettings({ privilegedModules: [' Tools ', 42, '', null] }).privilegedModules)
            .toEqual(['Tools']);
    });

    it('ignores ill-typed fields', () => {
        expect(normalizeSettings({ privilegedModules: 'CommonUtils', scanWorkspace: 'yes' }))
            .toEqual({ privilegedModules: [], scanWorkspace: true });
    });

    it('returns a copy of the default module list', () => {
        normalizeSettings({}).privilegedModules.push('Changed');
        expect(DEFAULT_SETTINGS.privilegedModules).toEqual([]);
    });
});
