import { Diagnostic, Location, Position } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';

import { validateDocument } from './diagnostics';
import { describeModule, isBslUri } from './modules';
import { parseDocument } from './parser';
import { perfMonitor } from './performance';
import { ReferenceIndex } from './references';
import { DocumentContext, ModuleRegistry } from './registry';
import { DeclarationFinder, ReferenceIndexFinder, ReferenceResolver } from './resolver';
import { DEFAULT_SETTINGS, Settings } from './settings';
import { LogFunction } from './types';

export const LANGUAGE_ID = 'bsl';

const SKIPPED_DIRECTORIES = new Set(['node_modules', '.git']);

/**
 * The analysed project: parses documents, keeps the registry and the reference index
 * in step with document lifecycle events, and answers navigation requests.
 */
export class BslWorkspace {
    readonly registry: ModuleRegistry = new ModuleRegistry();
    readonly index: ReferenceIndex;
    readonly resolver: ReferenceResolver;

    private settings: Settings;
    private readonly log: LogFunction;
    // Files found by scanning; closing one of them reloads it from disk instead of dropping it
    private readonly diskUris: Set<string> = new Set();

    constructor(settings: Settings = DEFAULT_SETTINGS, log: LogFunction = () => {}) {
        this.settings = settings;
        this.log = log;
        this.index = new ReferenceIndex(this.registry);
        this.resolver = new ReferenceResolver([
            new ReferenceIndexFinder(this.index),
            new DeclarationFinder(this.registry)
        ]);
    }

    getSettings(): Settings {
        return this.settings;
    }

    updateSettings(settings: Settings): void {
        this.settings = settings;
    }

    indexDocument(document: TextDocument): DocumentContext {
        return perfMonitor.measure('indexDocument', () => {
            const descriptor = describeModule(document.uri);
            this.registry.declareModule(descriptor);

            const parsed = parseDocument(document, descriptor, this.registry, this.log);
            const context: DocumentContext = { ...descriptor, document, ...parsed };

            this.registry.addDocument(context);
            this.index.replaceDocument(document.uri, parsed.callSites);
            return context;
        }, document.uri);
    }

    closeDocument(uri: string): void {
        if (this.diskUris.has(uri) && this.loadFromDisk(uri)) {
            return;
        }
        this.index.retractDocument(uri);
        this.registry.removeDocument(uri);
    }

    // Returns the number of module files indexed
    scanFolder(folderUri: string): number {
        let root: string;
        try {
            root = fileURLToPath(folderUri);
        } catch (e) {
            this.log(`Cannot scan workspace folder '${folderUri}': ${e}`);
            return 0;
        }

        const uris = this.collectModuleFiles(root).map(file => pathToFileURL(file).toString());

        // Declare first so that calls between the scanned modules are recognised in any order
        for (const uri of uris) {
            this.registry.declareModule(describeModule(uri));
            this.diskUris.add(uri);
        }

        let indexed = 0;
        for (const uri of uris) {
            if (this.loadFromDisk(uri)) indexed++;
        }
        return indexed;
    }

    validate(uri: string): Diagnostic[] {
        const context = this.registry.getDocument(uri);
        if (!context) return [];
        return validateDocument(context, this.index, this.settings);
    }

    findDefinition(uri: string, position: Position): Location | undefined {
        const reference = this.resolver.findReference(uri, position);
        if (!reference) return undefined;
        return Location.create(reference.symbol.owner.uri, reference.symbol.selectionRange);
    }

    // Call sites of the method at the position, which may be a call or the method's declaration
    findReferences(uri: string, position: Position, includeDeclaration: boolean): Location[] {
        const reference = this.resolver.findReference(uri, position);
        if (!reference) return [];

        const target = reference.symbol;
        const locations = perfMonitor.measure('referencesTo', () => this.index.referencesTo(target), uri)
            .map(ref => Location.create(ref.uri, ref.selectionRange));

        if (includeDeclaration) {
            locations.unshift(Location.create(target.owner.uri, target.selectionRange));
        }
        return locations;
    }

    private loadFromDisk(uri: string): boolean {
        let content: string;
        try {
            content = fs.readFileSync(fileURLToPath(uri), 'utf-8');
        } catch (e) {
            this.log(`Failed to read module file '${uri}': ${e}`);
            return false;
        }
        this.indexDocument(TextDocument.create(uri, LANGUAGE_ID, 0, content));
        return true;
    }

    private collectModuleFiles(dir: string): string[] {
        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(dir, { withFileTypes: true });
        } catch (e) {
            this.log(`Failed to read directory '${dir}': ${e}`);
            return [];
        }

        const files: string[] = [];
        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (!SKIPPED_DIRECTORIES.has(entry.name)) {
                    files.push(...this.collectModuleFiles(fullPath));
                }
            } else if (entry.isFile() && isBslUri(entry.name)) {
                files.push(fullPath);
            }
        }
        return files.sort();
    }
}
