import { MODULE_KINDS, MODULE_KIND_KEYS } from './constants';
import { ModuleKind, SourceDefinedSymbol } from './types';
import { foldName } from './utils';

const KIND_BY_KEY = new Map<string, ModuleKind>(MODULE_KINDS.map((kind): [string, ModuleKind] => [MODULE_KIND_KEYS[kind], kind]));

function isKeyTriple(value: unknown): value is [string, string, string] {
    return Array.isArray(value) && value.length === 3 && value.every(part => typeof part === 'string');
}

export function moduleKindKey(kind: ModuleKind): string {
    return MODULE_KIND_KEYS[kind];
}

// A key form that maps to no module kind means an identity key was built outside SymbolIdentity
export function moduleKindFromKey(key: string): ModuleKind {
    const kind = KIND_BY_KEY.get(key);
    if (kind === undefined) {
        throw new Error(`Unknown module kind key '${key}'`);
    }
    return kind;
}

/**
 * Canonical name of a method inside a module. The symbol name is case-folded on
 * construction, so two identities are equal exactly when their keys are equal.
 */
export class SymbolIdentity {
    readonly moduleRef: string;
    readonly moduleKind: ModuleKind;
    readonly symbolName: string;
    readonly key: string;

    constructor(moduleRef: string, moduleKind: ModuleKind, symbolName: string) {
        this.moduleRef = moduleRef;
        this.moduleKind = moduleKind;
        this.symbolName = foldName(symbolName);
        this.key = JSON.stringify([moduleRef, moduleKindKey(moduleKind), this.symbolName]);
    }

    static fromKey(key: string): SymbolIdentity {
        const parts: unknown = JSON.parse(key);
        if (!isKeyTriple(parts)) {
            throw new Error(`Malformed symbol identity key '${key}'`);
        }
        const [moduleRef, kindKey, symbolName] = parts;
        return new SymbolIdentity(moduleRef, moduleKindFromKey(kindKey), symbolName);
    }

    static of(symbol: SourceDefinedSymbol): SymbolIdentity {
        return new SymbolIdentity(symbol.owner.moduleRef, symbol.owner.moduleKind, symbol.name);
    }

    equals(other: SymbolIdentity): boolean {
        return this.key === other.key;
    }

    toString(): string {
        return `${this.moduleRef}.${this.symbolName} (${this.moduleKind})`;
    }
}
