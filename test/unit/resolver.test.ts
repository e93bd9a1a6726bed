import { describe, it, expect, beforeEach } from 'vitest';
import { Position, Range } from 'vscode-languageserver/node';
import { ReferenceIndex } from '../../src/server/references';
import { ModuleRegistry } from '../../src/server/registry';
import {
    DeclarationFinder,
    ReferenceFinder,
    ReferenceIndexFinder,
    ReferenceResolver
} from '../../src/server/resolver';
import { Reference } from '../../src/server/types';
import { commonModuleUri, descriptor, loadDocument } from '../helpers/doc';

const COMMON_UTILS = descriptor(commonModuleUri('CommonUtils'), 'CommonModule.CommonUtils', 'CommonModule');

describe('ReferenceResolver', () => {
    let registry: ModuleRegistry;
    let index: ReferenceIndex;

    beforeEach(() => {
        registry = new ModuleRegistry();
        index = new ReferenceIndex(registry);
        const context = loadDocument(registry, [
            'Procedure DoWork() Export',
            '    Helper();',
            'EndProcedure',
            'Procedure Helper()',
            'EndProcedure'
        ], COMMON_UTILS);
        index.replaceDocument(context.uri, context.callSites);
    });

    it('finds a call recorded in the index', () => {
        const reference = new ReferenceIndexFinder(index).findReference(COMMON_UTILS.uri, Position.create(1, 6));
        expect(reference?.symbol.name).toBe('Helper');
        expect(reference?.from.name).toBe('DoWork');
        expect(reference?.selectionRange).toEqual(Range.create(1, 4, 1, 10));
    });

    it('treats a method name at its declaration as a reference to itself', () => {
        const reference = new DeclarationFinder(registry).findReference(COMMON_UTILS.uri, Position.create(3, 12));
        expect(reference?.symbol.name).toBe('Helper');
        expect(reference?.from).toBe(reference?.symbol);
        expect(reference?.selectionRange).toEqual(Range.create(3, 10, 3, 16));
    });

    it('finds no declaration outside a method name or in an unknown document', () => {
        const finder = new DeclarationFinder(registry);
        expect(finder.findReference(COMMON_UTILS.uri, Position.create(3, 2))).toBeUndefined();
        expect(finder.findReference('file:///other.bsl', Position.create(3, 12))).toBeUndefined();
    });

    it('returns the first finder\'s answer', () => {
        const calls: string[] = [];
        const recording = (name: string, result?: Reference): ReferenceFinder => ({
            findReference: () => {
                calls.push(name);
                return result;
            }
        });
        const declared = new DeclarationFinder(registry).findReference(COMMON_UTILS.uri, Position.create(0, 12));

        const resolver = new ReferenceResolver([
            recording('empty'),
            recording('declared', declared),
            recording('unreached', declared)
        ]);

        expect(resolver.findReference(COMMON_UTILS.uri, Position.create(0, 12))?.symbol.name).toBe('DoWork');
        expect(calls).toEqual(['empty', 'declared']);
    });

    it('returns nothing when no finder recognises the position', () => {
        const resolver = new ReferenceResolver([new ReferenceIndexFinder(index), new DeclarationFinder(registry)]);
        expect(resolver.findReference(COMMON_UTILS.uri, Position.create(2, 0))).toBeUndefined();
    });
});
