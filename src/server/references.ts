import { Location, Position, Range } from 'vscode-languageserver/node';

import { SymbolIdentity } from './identity';
import { ModuleRegistry } from './registry';
import { isSameSymbol } from './tree';
import { CallSite, MethodSymbol, ModuleKind, Reference, SourceDefinedSymbol } from './types';
import { containsPosition, copyRange, rangeKey, rangesEqual } from './utils';

interface StoredEdge {
    range: Range;
    key: string;
}

function bucket<K, V>(map: Map<K, V>, key: K, create: () => V): V {
    let value = map.get(key);
    if (value === undefined) {
        value = create();
        map.set(key, value);
    }
    return value;
}

/**
 * Call edges between modules of the project, kept in three views:
 * who calls a method, what a document calls, and what sits at a range.
 * The views are only touched through this class, and every mutation updates all three
 * before returning. Stored targets are identity keys; symbols are looked up in the
 * registry on every query because the target document may have been reparsed or closed.
 *
 * Queries only see loaded documents: call sites in documents that are not loaded,
 * and targets whose module is not loaded, are left out of the results.
 * Qualified calls are only recorded when the parser knows the target module, so a document
 * parsed before a module it calls was declared has no edges to it until it is reparsed.
 */
export class ReferenceIndex {
    private readonly registry: ModuleRegistry;

    // identity key -> call sites targeting it, in insertion order
    private readonly callersByTarget: Map<string, Location[]> = new Map();
    // document URI -> identity key -> ranges of the calls made from that document
    private readonly callsByDocument: Map<string, Map<string, Range[]>> = new Map();
    // document URI -> range key -> the single edge recorded at that range
    private readonly targetsByRange: Map<string, Map<string, StoredEdge>> = new Map();

    constructor(registry: ModuleRegistry) {
        this.registry = registry;
    }

    insertEdge(uri: string, moduleRef: string, moduleKind: ModuleKind, symbolName: string, range: Range): void {
        const key = new SymbolIdentity(moduleRef, moduleKind, symbolName).key;
        const ranges = bucket(this.targetsByRange, uri, () => new Map<string, StoredEdge>());
        const stored = copyRange(range);
        const rangeId = rangeKey(stored);

        // One edge per range: the later insertion replaces the earlier one in every view
        const previous = ranges.get(rangeId);
        if (previous) {
            this.unlink(uri, previous);
        }

        ranges.set(rangeId, { range: stored, key });
        bucket(this.callersByTarget, key, () => []).push(Location.create(uri, stored));
        bucket(bucket(this.callsByDocument, uri, () => new Map<string, Range[]>()), key, () => []).push(stored);
    }

    retractDocument(uri: string): void {
        const ranges = this.targetsByRange.get(uri);
        if (ranges) {
            const keys = new Set([...ranges.values()].map(edge => edge.key));
            for (const key of keys) {
                const locations = this.callersByTarget.get(key);
                if (!locations) continue;
                const remaining = locations.filter(location => location.uri !== uri);
                if (remaining.length > 0) {
                    this.callersByTarget.set(key, remaining);
                } else {
                    this.callersByTarget.delete(key);
                }
            }
        }
        this.callsByDocument.delete(uri);
        this.targetsByRange.delete(uri);
    }

    // Drop the document's previous edges and record the new ones without yielding in between
    replaceDocument(uri: string, callSites: CallSite[]): void {
        this.retractDocument(uri);
        for (const site of callSites) {
            this.insertEdge(uri, site.moduleRef, site.moduleKind, site.symbolName, site.range);
        }
    }

    edgeCount(uri?: string): number {
        if (uri !== undefined) {
            return this.targetsByRange.get(uri)?.size ?? 0;
        }
        let count = 0;
        for (const ranges of this.targetsByRange.values()) {
            count += ranges.size;
        }
        return count;
    }

    referencesTo(target: SymbolIdentity | SourceDefinedSymbol): Reference[] {
        const identity = target instanceof SymbolIdentity ? target : SymbolIdentity.of(target);
        const locations = [...(this.callersByTarget.get(identity.key) ?? [])];

        const symbol = this.resolveSymbol(identity.key);
        if (!symbol) return [];

        const references: Reference[] = [];
        for (const location of locations) {
            const from = this.resolveFrom(location.uri, location.range.start);
            if (from) {
                references.push({ from, symbol, uri: location.uri, selectionRange: copyRange(location.range) });
            }
        }
        return references;
    }

    referencesFrom(uri: string): Reference[] {
        const edges: StoredEdge[] = [];
        for (const [key, ranges] of this.callsByDocument.get(uri) ?? []) {
            for (const range of ranges) {
                edges.push({ range, key });
            }
        }

        const references: Reference[] = [];
        for (const edge of edges) {
            const reference = this.buildReference(uri, edge);
            if (reference) {
                references.push(reference);
            }
        }
        return references;
    }

    // Compared by owner, kind and name: the symbol may come from an older tree of the same document
    referencesFromSymbol(symbol: SourceDefinedSymbol): Reference[] {
        return this.referencesFrom(symbol.owner.uri)
            .filter(reference => isSameSymbol(reference.from, symbol));
    }

    referenceAt(uri: string, position: Position): Reference | undefined {
        const ranges = this.targetsByRange.get(uri);
        if (!ranges) return undefined;

        // Linear in the number of calls in the document
        let found: StoredEdge | undefined;
        for (const edge of ranges.values()) {
            if (containsPosition(edge.range, position)) {
                found = edge;
                break;
            }
        }
        return found ? this.buildReference(uri, found) : undefined;
    }

    private unlink(uri: string, edge: StoredEdge): void {
        const locations = this.callersByTarget.get(edge.key);
        if (locations) {
            const remaining = locations.filter(l => !(l.uri === uri && rangesEqual(l.range, edge.range)));
            if (remaining.length > 0) {
                this.callersByTarget.set(edge.key, remaining);
            } else {
                this.callersByTarget.delete(edge.key);
            }
        }

        const byKey = this.callsByDocument.get(uri);
        const ranges = byKey?.get(edge.key);
        if (byKey && ranges) {
            const remaining = ranges.filter(r => !rangesEqual(r, edge.range));
            if (remaining.length > 0) {
                byKey.set(edge.key, remaining);
            } else {
                byKey.delete(edge.key);
            }
        }
    }

    private buildReference(uri: string, edge: StoredEdge): Reference | undefined {
        const symbol = this.resolveSymbol(edge.key);
        if (!symbol) return undefined;
        const from = this.resolveFrom(uri, edge.range.start);
        if (!from) return undefined;
        return { from, symbol, uri, selectionRange: copyRange(edge.range) };
    }

    private resolveSymbol(key: string): MethodSymbol | undefined {
        const identity = SymbolIdentity.fromKey(key);
        return this.registry.resolve(identity.moduleRef, identity.moduleKind)
            ?.symbolTree.getMethodSymbol(identity.symbolName);
    }

    private resolveFrom(uri: string, position: Position): SourceDefinedSymbol | undefined {
        return this.registry.getDocument(uri)?.symbolTree.getSymbolAt(position);
    }
}
