import { Position } from 'vscode-languageserver/node';

import { ReferenceIndex } from './references';
import { ModuleRegistry } from './registry';
import { Reference } from './types';
import { containsPosition } from './utils';

export interface ReferenceFinder {
    findReference(uri: string, position: Position): Reference | undefined;
}

// Call sites recorded in the reference index
export class ReferenceIndexFinder implements ReferenceFinder {
    private readonly index: ReferenceIndex;

    constructor(index: ReferenceIndex) {
        this.index = index;
    }

    findReference(uri: string, position: Position): Reference | undefined {
        return this.index.referenceAt(uri, position);
    }
}

// A method name at its own declaration refers to the method itself
export class DeclarationFinder implements ReferenceFinder {
    private readonly registry: ModuleRegistry;

    constructor(registry: ModuleRegistry) {
        this.registry = registry;
    }

    findReference(uri: string, position: Position): Reference | undefined {
        const method = this.registry.getDocument(uri)?.symbolTree.getMethods()
            .find(m => containsPosition(m.selectionRange, position));
        if (!method) return undefined;
        return { from: method, symbol: method, uri, selectionRange: method.selectionRange };
    }
}

// Asks each finder in turn; the first one that recognises the location wins
export class ReferenceResolver {
    private readonly finders: ReferenceFinder[];

    constructor(finders: ReferenceFinder[]) {
        this.finders = finders;
    }

    findReference(uri: string, position: Position): Reference | undefined {
        for (const finder of this.finders) {
            const reference = finder.findReference(uri, position);
            if (reference) return reference;
        }
        return undefined;
    }
}
