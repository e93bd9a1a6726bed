import { Position, SymbolKind } from 'vscode-languageserver/node';

import { MethodSymbol, ModuleSymbol, SourceDefinedSymbol } from './types';
import { containsPosition, foldName } from './utils';

export class SymbolTree {
    readonly module: ModuleSymbol;
    private readonly methodsByName: Map<string, MethodSymbol> = new Map();
    private readonly flat: SourceDefinedSymbol[] = [];

    constructor(module: ModuleSymbol) {
        this.module = module;

        const visit = (symbol: SourceDefinedSymbol) => {
            this.flat.push(symbol);
            if (symbol.kind === SymbolKind.Method) {
                // First declaration wins; duplicates are reported by diagnostics
                const name = foldName(symbol.name);
                if (!this.methodsByName.has(name)) {
                    this.methodsByName.set(name, symbol);
                }
            }
            symbol.children.forEach(visit);
        };
        module.children.forEach(visit);
    }

    getMethodSymbol(name: string): MethodSymbol | undefined {
        return this.methodsByName.get(foldName(name));
    }

    getMethods(): MethodSymbol[] {
        return this.flat.filter((symbol): symbol is MethodSymbol => symbol.kind === SymbolKind.Method);
    }

    // Depth-first, parents before their children; the module symbol itself is not included
    getChildrenFlat(): SourceDefinedSymbol[] {
        return [...this.flat];
    }

    // Enclosing declared symbol at the position, ignoring regions; the module when none contains it
    getSymbolAt(position: Position): SourceDefinedSymbol {
        const found = this.flat.find(symbol =>
            symbol.kind !== SymbolKind.Namespace && containsPosition(symbol.range, position)
        );
        return found ?? this.module;
    }
}

// Same declared symbol, possibly from different parses of the same document
export function isSameSymbol(a: SourceDefinedSymbol, b: SourceDefinedSymbol): boolean {
    return a.kind === b.kind && a.owner.uri === b.owner.uri && foldName(a.name) === foldName(b.name);
}
