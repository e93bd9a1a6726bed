import { Range, SymbolKind } from 'vscode-languageserver/node';

import { ModuleKind } from './constants';

export type { ModuleKind };

export type LogFunction = (message: string) => void;

// Where a module lives: its document and the metadata object it belongs to
export interface ModuleDescriptor {
    uri: string;
    // e.g. "CommonModule.CommonUtils" or "Catalog.Products"
    moduleRef: string;
    moduleKind: ModuleKind;
}

interface SymbolBase {
    // Declared name with its source casing (for display)
    name: string;
    owner: ModuleDescriptor;
    range: Range;
    selectionRange: Range;
    children: SourceDefinedSymbol[];
}

export interface ModuleSymbol extends SymbolBase {
    kind: typeof SymbolKind.Module;
}

export interface RegionSymbol extends SymbolBase {
    kind: typeof SymbolKind.Namespace;
}

export interface MethodSymbol extends SymbolBase {
    kind: typeof SymbolKind.Method;
    isFunction: boolean;
    isExport: boolean;
    parameters: string[];
}

export type SourceDefinedSymbol = ModuleSymbol | RegionSymbol | MethodSymbol;

// A call found while parsing: the callee name token and the module it targets
export interface CallSite {
    moduleRef: string;
    moduleKind: ModuleKind;
    symbolName: string;
    range: Range;
}

// A call edge resolved against the currently loaded documents
export interface Reference {
    from: SourceDefinedSymbol;
    symbol: MethodSymbol;
    uri: string;
    selectionRange: Range;
}

export interface StructureProblem {
    range: Range;
    message: string;
}
