import { TextDocument } from 'vscode-languageserver-textdocument';
import { parseDocument } from '../../src/server/parser';
import { DocumentContext, ModuleRegistry } from '../../src/server/registry';
import { ModuleDescriptor, ModuleKind } from '../../src/server/types';

let docCounter = 0;

/** Create a TextDocument from source lines. */
export function createDoc(source: string | string[], uri?: string): TextDocument {
    const effectiveUri = uri ?? `file:///test-${++docCounter}.bsl`;
    const text = Array.isArray(source) ? source.join('\n') : source;
    return TextDocument.create(effectiveUri, 'bsl', 1, text);
}

export function descriptor(uri: string, moduleRef: string, moduleKind: ModuleKind): ModuleDescriptor {
    return { uri, moduleRef, moduleKind };
}

/** URI of a common module inside a configuration dump. */
export function commonModuleUri(name: string): string {
    return `file:///config/CommonModules/${name}/Ext/Module.bsl`;
}

/** Parse a module and register it as loaded, the way the workspace does. */
export function loadDocument(
    registry: ModuleRegistry,
    source: string | string[],
    module: ModuleDescriptor
): DocumentContext {
    const document = createDoc(source, module.uri);
    registry.declareModule(module);
    const parsed = parseDocument(document, module, registry);
    const context: DocumentContext = { ...module, document, ...parsed };
    registry.addDocument(context);
    return context;
}
