import { describe, it, expect, beforeEach } from 'vitest';
import { DiagnosticSeverity, Range } from 'vscode-languageserver/node';
import { checkDuplicateMethods, checkPrivilegedModuleCalls, validateDocument } from '../../src/server/diagnostics';
import { ReferenceIndex } from '../../src/server/references';
import { DocumentContext, ModuleRegistry } from '../../src/server/registry';
import { Settings } from '../../src/server/settings';
import { commonModuleUri, descriptor, loadDocument } from '../helpers/doc';

const COMMON_UTILS = descriptor(commonModuleUri('CommonUtils'), 'CommonModule.CommonUtils', 'CommonModule');
const TOOLS = descriptor(commonModuleUri('Tools'), 'CommonModule.Tools', 'CommonModule');
const FORM = descriptor('file:///form.bsl', 'Catalog.Products.Form.ItemForm', 'FormModule');

function settings(privilegedModules: string[]): Settings {
    return { privilegedModules, scanWorkspace: false };
}

describe('diagnostics', () => {
    let registry: ModuleRegistry;
    let index: ReferenceIndex;
    let commonUtils: DocumentContext;
    let form: DocumentContext;

    function load(source: string[], module = FORM): DocumentContext {
        const context = loadDocument(registry, source, module);
        index.replaceDocument(context.uri, context.callSites);
        return context;
    }

    beforeEach(() => {
        registry = new ModuleRegistry();
        index = new ReferenceIndex(registry);
        registry.declareModule(COMMON_UTILS);
        registry.declareModule(TOOLS);

        commonUtils = load([
            'Procedure DoWork() Export',
            '    Helper();',
            'EndProcedure',
            'Procedure Helper()',
            'EndProcedure'
        ], COMMON_UTILS);
        load(['Procedure Format() Export', 'EndProcedure'], TOOLS);
        form = load([
            'Procedure OnOpen()',
            '    CommonUtils.DoWork();',
            '    Tools.Format();',
            'EndProcedure'
        ]);
    });

    describe('privileged module method calls', () => {
        it('warns on each call into a privileged module', () => {
            expect(checkPrivilegedModuleCalls(form, index, settings(['commonutils']))).toEqual([{
                severity: DiagnosticSeverity.Warning,
                range: Range.create(1, 16, 1, 22),
                message: "Check the call to privileged module method 'DoWork'",
                source: 'bsl',
                code: 'PrivilegedModuleMethodCall'
            }]);
        });

        it('accepts the full module ref in settings', () => {
            const diags = checkPrivilegedModuleCalls(form, index, settings(['CommonModule.Tools']));
            expect(diags.map(d => d.message)).toEqual(["Check the call to privileged module method 'Format'"]);
        });

        it('reports nothing without privileged modules', () => {
            expect(checkPrivilegedModuleCalls(form, index, settings([]))).toEqual([]);
        });

        it('reports calls made inside the privileged module itself', () => {
            const diags = checkPrivilegedModuleCalls(commonUtils, index, settings(['CommonUtils']));
            expect(diags.map(d => [d.message, d.range])).toEqual([
                ["Check the call to privileged module method 'Helper'", Range.create(1, 4, 1, 10)]
            ]);
        });

        it('reports nothing while the privileged module is not loaded', () => {
            registry.removeDocument(COMMON_UTILS.uri);
            expect(checkPrivilegedModuleCalls(form, index, settings(['CommonUtils']))).toEqual([]);
        });
    });

    describe('duplicate methods', () => {
        it('flags every repeated method name', () => {
            const context = load([
                'Procedure Run()',
                'EndProcedure',
                'Procedure run()',
                'EndProcedure'
            ]);
            expect(checkDuplicateMethods(context)).toEqual([{
                severity: DiagnosticSeverity.Error,
                range: Range.create(2, 10, 2, 13),
                message: "Duplicate method 'run'",
                source: 'bsl',
                code: 'DuplicateMethod'
            }]);
        });

        it('allows distinct names', () => {
            expect(checkDuplicateMethods(form)).toEqual([]);
        });
    });

    describe('validateDocument', () => {
        it('combines structure, duplicate and privileged call diagnostics', () => {
            const context = load([
                'Procedure OnOpen()',
                '    CommonUtils.DoWork();',
                'EndProcedure',
                'Procedure OnOpen()',
                'EndProcedure',
                'EndFunction'
            ]);
            const diags = validateDocument(context, index, settings(['CommonUtils']));
            expect(diags.map(d => [d.code, d.severity, d.message])).toEqual([
                ['ModuleStructure', DiagnosticSeverity.Error, "'EndFunction' without matching method declaration"],
                ['DuplicateMethod', DiagnosticSeverity.Error, "Duplicate method 'OnOpen'"],
                ['PrivilegedModuleMethodCall', DiagnosticSeverity.Warning, "Check the call to privileged module method 'DoWork'"]
            ]);
        });
    });
});
