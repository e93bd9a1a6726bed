import { Diagnostic, DiagnosticSeverity } from 'vscode-languageserver/node';

import { ReferenceIndex } from './references';
import { DocumentContext } from './registry';
import { Settings } from './settings';
import { MethodSymbol, Reference } from './types';
import { foldName } from './utils';

const SOURCE = 'bsl';

// "CommonUtils" and "CommonModule.CommonUtils" name the same module
function privilegedModuleRefs(settings: Settings): Set<string> {
    return new Set(settings.privilegedModules.map(name =>
        foldName(name.includes('.') ? name : `CommonModule.${name}`)
    ));
}

function isPrivilegedCall(reference: Reference, privileged: Set<string>): boolean {
    const owner = reference.symbol.owner;
    return owner.moduleKind === 'CommonModule'
        && privileged.has(foldName(owner.moduleRef));
}

export function checkPrivilegedModuleCalls(
    context: DocumentContext,
    index: ReferenceIndex,
    settings: Settings
): Diagnostic[] {
    const privileged = privilegedModuleRefs(settings);
    if (privileged.size === 0) return [];

    return index.referencesFrom(context.uri)
        .filter(reference => isPrivilegedCall(reference, privileged))
        .map(reference => ({
            severity: DiagnosticSeverity.Warning,
            range: reference.selectionRange,
            message: `Check the call to privileged module method '${reference.symbol.name}'`,
            source: SOURCE,
            code: 'PrivilegedModuleMethodCall'
        }));
}

export function checkDuplicateMethods(context: DocumentContext): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    const seen = new Map<string, MethodSymbol>();

    for (const method of context.symbolTree.getMethods()) {
        const name = foldName(method.name);
        if (seen.has(name)) {
            diagnostics.push({
                severity: DiagnosticSeverity.Error,
                range: method.selectionRange,
                message: `Duplicate method '${method.name}'`,
                source: SOURCE,
                code: 'DuplicateMethod'
            });
        } else {
            seen.set(name, method);
        }
    }

    return diagnostics;
}

export function validateDocument(
    context: DocumentContext,
    index: ReferenceIndex,
    settings: Settings
): Diagnostic[] {
    const structure: Diagnostic[] = context.problems.map(problem => ({
        severity: DiagnosticSeverity.Error,
        range: problem.range,
        message: problem.message,
        source: SOURCE,
        code: 'ModuleStructure'
    }));

    return [
        ...structure,
        ...checkDuplicateMethods(context),
        ...checkPrivilegedModuleCalls(context, index, settings)
    ];
}
