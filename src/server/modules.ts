import * as path from 'path';
import { fileURLToPath } from 'url';

import { BSL_EXTENSIONS, METADATA_FOLDERS, MODULE_KIND_KEYS } from './constants';
import { ModuleDescriptor, ModuleKind } from './types';

// Module files that belong to a metadata object: <Folder>/<Name>/Ext/<file>
const OBJECT_MODULE_KINDS: ModuleKind[] = [
    'ObjectModule',
    'ManagerModule',
    'RecordSetModule',
    'ValueManagerModule'
];

// Module files of the configuration itself: Ext/<file> at the dump root
const CONFIGURATION_MODULE_KINDS: ModuleKind[] = [
    'SessionModule',
    'ManagedApplicationModule',
    'OrdinaryApplicationModule',
    'ExternalConnectionModule'
];

function kindOfFile(fileName: string, kinds: ModuleKind[]): ModuleKind | undefined {
    return kinds.find(kind => MODULE_KIND_KEYS[kind] === fileName);
}

function pathSegments(uri: string): string[] {
    if (!uri.startsWith('file:')) return [];
    try {
        return fileURLToPath(uri).split(path.sep).filter(s => s.length > 0);
    } catch {
        return [];
    }
}

export function isBslUri(uri: string): boolean {
    const lower = uri.toLowerCase();
    return BSL_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Work out which module a file holds from its place in a configuration dump.
 * Files outside the dump layout become standalone modules keyed by their URI.
 */
export function describeModule(uri: string): ModuleDescriptor {
    const s = pathSegments(uri);
    const n = s.length;
    const fileName = s[n - 1];
    const at = (offset: number): string => s[n - offset] ?? '';

    if (n >= 7 && fileName === 'Module.bsl' && at(2) === 'Form' && at(3) === 'Ext' && at(5) === 'Forms') {
        const type = METADATA_FOLDERS[at(7)];
        if (type) {
            return { uri, moduleRef: `${type}.${at(6)}.Form.${at(4)}`, moduleKind: 'FormModule' };
        }
    }

    if (n >= 5 && fileName === 'Module.bsl' && at(2) === 'Form' && at(3) === 'Ext' && at(5) === 'CommonForms') {
        return { uri, moduleRef: `CommonForm.${at(4)}`, moduleKind: 'FormModule' };
    }

    if (n >= 7 && fileName === 'CommandModule.bsl' && at(2) === 'Ext' && at(4) === 'Commands') {
        const type = METADATA_FOLDERS[at(6)];
        if (type) {
            return { uri, moduleRef: `${type}.${at(5)}.Command.${at(3)}`, moduleKind: 'CommandModule' };
        }
    }

    if (n >= 4 && at(2) === 'Ext') {
        const type = METADATA_FOLDERS[at(4)];
        if (type === 'CommonModule' && fileName === 'Module.bsl') {
            return { uri, moduleRef: `CommonModule.${at(3)}`, moduleKind: 'CommonModule' };
        }
        if (type === 'CommonCommand' && fileName === 'CommandModule.bsl') {
            return { uri, moduleRef: `CommonCommand.${at(3)}`, moduleKind: 'CommandModule' };
        }
        const kind = kindOfFile(fileName, OBJECT_MODULE_KINDS);
        if (type && kind) {
            return { uri, moduleRef: `${type}.${at(3)}`, moduleKind: kind };
        }
    }

    if (n >= 2 && at(2) === 'Ext') {
        const kind = kindOfFile(fileName, CONFIGURATION_MODULE_KINDS);
        if (kind) {
            return { uri, moduleRef: 'Configuration', moduleKind: kind };
        }
    }

    return { uri, moduleRef: uri, moduleKind: 'BSLModule' };
}
