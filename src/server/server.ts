#!/usr/bin/env node
import {
    createConnection,
    TextDocuments,
    ProposedFeatures,
    InitializeParams,
    InitializeResult,
    TextDocumentSyncKind,
    DefinitionParams,
    Location,
    ReferenceParams
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';

import { isBslUri } from './modules';
import { normalizeSettings } from './settings';
import { BslWorkspace } from './workspace';

const connection = createConnection(ProposedFeatures.all);
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

const workspace = new BslWorkspace(undefined, (msg) => connection.console.warn(msg));

let hasConfigurationCapability = false;
let workspaceFolderUris: string[] = [];

function publishDiagnostics(uri: string): void {
    connection.sendDiagnostics({ uri, diagnostics: workspace.validate(uri) });
}

function loadConfiguration(): Promise<void> {
    if (!hasConfigurationCapability) {
        return Promise.resolve();
    }
    return connection.workspace.getConfiguration('bsl').then(
        (config: unknown) => {
            workspace.updateSettings(normalizeSettings(config));
        },
        (error) => {
            connection.console.warn(`Failed to get configuration: ${error}`);
        }
    );
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
    const capabilities = params.capabilities;
    hasConfigurationCapability = !!(
        capabilities.workspace && !!capabilities.workspace.configuration
    );

    if (params.workspaceFolders) {
        workspaceFolderUris = params.workspaceFolders.map(folder => folder.uri);
    } else if (params.rootUri) {
        workspaceFolderUris = [params.rootUri];
    }

    return {
        capabilities: {
            textDocumentSync: TextDocumentSyncKind.Incremental,
            definitionProvider: true,
            referencesProvider: true
        }
    };
});

connection.onInitialized(() => {
    connection.console.log('BSL language server initialized');

    loadConfiguration().then(() => {
        if (workspace.getSettings().scanWorkspace) {
            for (const folderUri of workspaceFolderUris) {
                const count = workspace.scanFolder(folderUri);
                connection.console.log(`Indexed ${count} modules in ${folderUri}`);
            }
        }

        // Open documents take precedence over their saved contents
        documents.all().forEach(doc => workspace.indexDocument(doc));
        documents.all().forEach(doc => publishDiagnostics(doc.uri));
        connection.console.log(`Reference index holds ${workspace.index.edgeCount()} calls`);
    }).catch((error) => {
        connection.console.error(`Failed to index workspace: ${error}`);
    });
});

// Re-validate with the new settings; the index itself does not depend on them
connection.onDidChangeConfiguration(() => {
    loadConfiguration().then(() => {
        documents.all().forEach(doc => publishDiagnostics(doc.uri));
    }).catch((error) => {
        connection.console.error(`Failed to apply configuration: ${error}`);
    });
});

connection.onDefinition((params: DefinitionParams): Location | null => {
    return workspace.findDefinition(params.textDocument.uri, params.position) ?? null;
});

connection.onReferences((params: ReferenceParams): Location[] => {
    return workspace.findReferences(
        params.textDocument.uri,
        params.position,
        params.context.includeDeclaration
    );
});

documents.onDidChangeContent(change => {
    if (!isBslUri(change.document.uri)) return;
    workspace.indexDocument(change.document);
    publishDiagnostics(change.document.uri);
});

documents.onDidClose(event => {
    workspace.closeDocument(event.document.uri);
    connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] });
});

documents.listen(connection);
connection.listen();
