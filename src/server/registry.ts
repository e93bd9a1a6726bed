import { TextDocument } from 'vscode-languageserver-textdocument';

import { ModuleLookup } from './parser';
import { SymbolTree } from './tree';
import { CallSite, ModuleDescriptor, ModuleKind, StructureProblem } from './types';
import { foldName } from './utils';

// Everything known about one analysed document
export interface DocumentContext extends ModuleDescriptor {
    document: TextDocument;
    symbolTree: SymbolTree;
    callSites: CallSite[];
    problems: StructureProblem[];
}

function moduleKey(moduleRef: string, moduleKind: ModuleKind): string {
    return `${moduleKind}:${foldName(moduleRef)}`;
}

/**
 * Loaded documents, addressable by URI and by module. Modules can also be declared
 * without being loaded (found on disk, not parsed yet) so that calls to them are recognised.
 */
export class ModuleRegistry implements ModuleLookup {
    private readonly documents: Map<string, DocumentContext> = new Map();
    private readonly loadedModules: Map<string, string> = new Map();
    private readonly declaredModules: Map<string, ModuleDescriptor> = new Map();

    declareModule(descriptor: ModuleDescriptor): void {
        this.declaredModules.set(moduleKey(descriptor.moduleRef, descriptor.moduleKind), descriptor);
    }

    addDocument(context: DocumentContext): void {
        const previous = this.documents.get(context.uri);
        if (previous) {
            this.loadedModules.delete(moduleKey(previous.moduleRef, previous.moduleKind));
        }
        this.documents.set(context.uri, context);
        this.loadedModules.set(moduleKey(context.moduleRef, context.moduleKind), context.uri);
        this.declareModule({ uri: context.uri, moduleRef: context.moduleRef, moduleKind: context.moduleKind });
    }

    // Declared modules stay declared: the file still exists even when it is not loaded
    removeDocument(uri: string): void {
        const context = this.documents.get(uri);
        if (!context) return;
        this.documents.delete(uri);
        const key = moduleKey(context.moduleRef, context.moduleKind);
        if (this.loadedModules.get(key) === uri) {
            this.loadedModules.delete(key);
        }
    }

    getDocument(uri: string): DocumentContext | undefined {
        return this.documents.get(uri);
    }

    resolve(moduleRef: string, moduleKind: ModuleKind): DocumentContext | undefined {
        const uri = this.loadedModules.get(moduleKey(moduleRef, moduleKind));
        return uri === undefined ? undefined : this.documents.get(uri);
    }

    findModule(moduleRef: string, moduleKind: ModuleKind): ModuleDescriptor | undefined {
        return this.declaredModules.get(moduleKey(moduleRef, moduleKind));
    }

    all(): DocumentContext[] {
        return [...this.documents.values()];
    }
}
