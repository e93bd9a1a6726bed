import { Range, Position, SymbolKind } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import {
    KEYWORDS,
    MANAGER_COLLECTIONS,
    METHOD_END_PATTERN,
    METHOD_START_PATTERN,
    REGION_END_PATTERN,
    REGION_START_PATTERN
} from './constants';
import { SymbolTree } from './tree';
import {
    CallSite,
    LogFunction,
    MethodSymbol,
    ModuleDescriptor,
    ModuleKind,
    ModuleSymbol,
    RegionSymbol,
    SourceDefinedSymbol,
    StructureProblem
} from './types';
import { blankLine, foldName } from './utils';

// Resolves a module named in source to its canonical descriptor (the registry implements this)
export interface ModuleLookup {
    findModule(moduleRef: string, moduleKind: ModuleKind): ModuleDescriptor | undefined;
}

export interface ParsedModule {
    symbolTree: SymbolTree;
    callSites: CallSite[];
    problems: StructureProblem[];
}

// Identifier chain directly followed by "(": Method(, Module.Method(, Catalogs.Name.Method(
// Method end keyword anywhere on a line, for methods declared on a single line
const INLINE_METHOD_END_PATTERN = /(?<![\p{L}\p{N}_])(?:endprocedure|endfunction|конецпроцедуры|конецфункции)(?![\p{L}\p{N}_])/iu;

const CALL_CHAIN_PATTERN = /(?<![\p{L}\p{N}_.])([\p{L}_][\p{L}\p{N}_]*(?:\.[\p{L}_][\p{L}\p{N}_]*)*)\s*\(/gu;

function parameterNames(text: string | undefined): string[] {
    if (!text) return [];
    return text.split(',')
        .map(p => p.split('=')[0].trim().replace(/^(?:val|знач)\s+/iu, ''))
        .filter(p => p.length > 0);
}

function lineEnd(lines: string[], lineNum: number): Position {
    return Position.create(lineNum, lines[lineNum]?.length ?? 0);
}

export function parseDocument(
    document: TextDocument,
    descriptor: ModuleDescriptor,
    lookup?: ModuleLookup,
    log?: LogFunction
): ParsedModule {
    const lines = document.getText().split(/\r?\n/);
    const problems: StructureProblem[] = [];

    function problem(range: Range, message: string): void {
        problems.push({ range, message });
        log?.(`${document.uri}:${range.start.line + 1}: ${message}`);
    }

    // Code with strings and comments blanked out, columns preserved
    const code: string[] = [];
    let inString = false;
    for (const line of lines) {
        const blanked = blankLine(line, inString);
        code.push(blanked.text);
        inString = blanked.inString;
    }

    const module: ModuleSymbol = {
        kind: SymbolKind.Module,
        name: descriptor.moduleRef,
        owner: descriptor,
        range: Range.create(Position.create(0, 0), lineEnd(lines, lines.length - 1)),
        selectionRange: Range.create(Position.create(0, 0), Position.create(0, 0)),
        children: []
    };

    const regionStack: RegionSymbol[] = [];
    let currentMethod: MethodSymbol | null = null;

    function container(): SourceDefinedSymbol {
        return regionStack.length > 0 ? regionStack[regionStack.length - 1] : module;
    }

    function closeMethod(method: MethodSymbol, end: Position): void {
        method.range = Range.create(method.range.start, end);
        container().children.push(method);
        currentMethod = null;
    }

    for (let lineNum = 0; lineNum < code.length; lineNum++) {
        const text = code[lineNum];
        if (text.trim() === '') continue;

        const regionStart = text.match(REGION_START_PATTERN);
        if (regionStart) {
            const indent = regionStart[1].length;
            const name = regionStart[2];
            const nameStart = regionStart[0].length - name.length;
            regionStack.push({
                kind: SymbolKind.Namespace,
                name,
                owner: descriptor,
                range: Range.create(Position.create(lineNum, indent), lineEnd(lines, lineNum)),
                selectionRange: Range.create(
                    Position.create(lineNum, nameStart),
                    Position.create(lineNum, nameStart + name.length)
                ),
                children: []
            });
            continue;
        }

        const regionEnd = text.match(REGION_END_PATTERN);
        if (regionEnd) {
            const region = regionStack.pop();
            const end = Position.create(lineNum, regionEnd[0].length);
            if (region) {
                region.range = Range.create(region.range.start, end);
                container().children.push(region);
            } else {
                problem(Range.create(Position.create(lineNum, regionEnd[1].length), end),
                    'Region end without matching region start');
            }
            continue;
        }

        const methodStart = text.match(METHOD_START_PATTERN);
        if (methodStart) {
            const indent = methodStart[1].length;
            const keyword = methodStart[2];
            const name = methodStart[3];
            const keywordEnd = methodStart[0].toLowerCase().indexOf(keyword.toLowerCase()) + keyword.length;
            const nameStart = text.indexOf(name, keywordEnd);

            if (currentMethod) {
                const unclosed: MethodSymbol = currentMethod;
                problem(unclosed.selectionRange, `Method '${unclosed.name}' is not closed`);
                closeMethod(unclosed, lineEnd(lines, lineNum - 1));
            }

            currentMethod = {
                kind: SymbolKind.Method,
                name,
                owner: descriptor,
                range: Range.create(Position.create(lineNum, indent), lineEnd(lines, lineNum)),
                selectionRange: Range.create(
                    Position.create(lineNum, nameStart),
                    Position.create(lineNum, nameStart + name.length)
                ),
                children: [],
                isFunction: /^(?:function|функция)$/iu.test(keyword),
                isExport: methodStart[5] !== undefined,
                parameters: parameterNames(methodStart[4])
            };

            const rest = text.slice(methodStart[0].length);
            const inlineEnd = INLINE_METHOD_END_PATTERN.exec(rest);
            if (inlineEnd) {
                closeMethod(currentMethod, Position.create(
                    lineNum, methodStart[0].length + inlineEnd.index + inlineEnd[0].length
                ));
            }
            continue;
        }

        const methodEnd = text.match(METHOD_END_PATTERN);
        if (methodEnd) {
            const end = Position.create(lineNum, methodEnd[0].length);
            if (currentMethod) {
                closeMethod(currentMethod, end);
            } else {
                problem(Range.create(Position.create(lineNum, methodEnd[1].length), end),
                    `'${methodEnd[2]}' without matching method declaration`);
            }
        }
    }

    const lastLine = lines.length - 1;
    if (currentMethod) {
        const unclosed: MethodSymbol = currentMethod;
        problem(unclosed.selectionRange, `Method '${unclosed.name}' is not closed`);
        closeMethod(unclosed, lineEnd(lines, lastLine));
    }
    while (regionStack.length > 0) {
        const region = regionStack.pop();
        if (!region) break;
        problem(region.selectionRange, `Region '${region.name}' is not closed`);
        region.range = Range.create(region.range.start, lineEnd(lines, lastLine));
        container().children.push(region);
    }

    const symbolTree = new SymbolTree(module);
    const callSites = collectCallSites(code, descriptor, symbolTree, lookup);

    return { symbolTree, callSites, problems };
}

function collectCallSites(
    code: string[],
    descriptor: ModuleDescriptor,
    symbolTree: SymbolTree,
    lookup?: ModuleLookup
): CallSite[] {
    const callSites: CallSite[] = [];

    // Method names at their own declarations are not calls
    const declarations = new Set(
        symbolTree.getMethods().map(m => `${m.selectionRange.start.line}:${m.selectionRange.start.character}`)
    );

    for (let lineNum = 0; lineNum < code.length; lineNum++) {
        const text = code[lineNum];
        CALL_CHAIN_PATTERN.lastIndex = 0;
        let match;
        while ((match = CALL_CHAIN_PATTERN.exec(text)) !== null) {
            const chain = match[1];
            const segments = chain.split('.');
            const methodName = segments[segments.length - 1];
            const startCol = match.index + chain.length - methodName.length;
            const range = Range.create(
                Position.create(lineNum, startCol),
                Position.create(lineNum, startCol + methodName.length)
            );

            let target: ModuleDescriptor | undefined;
            if (segments.length === 1) {
                if (KEYWORDS.has(foldName(methodName)) || declarations.has(`${lineNum}:${startCol}`)) continue;
                if (symbolTree.getMethodSymbol(methodName)) {
                    target = descriptor;
                }
            } else if (segments.length === 2) {
                target = lookup?.findModule(`CommonModule.${segments[0]}`, 'CommonModule');
            } else if (segments.length === 3) {
                const metadataType = MANAGER_COLLECTIONS[foldName(segments[0])];
                if (metadataType) {
                    target = lookup?.findModule(`${metadataType}.${segments[1]}`, 'ManagerModule');
                }
            }

            if (target) {
                callSites.push({
                    moduleRef: target.moduleRef,
                    moduleKind: target.moduleKind,
                    symbolName: methodName,
                    range
                });
            }
        }
    }

    return callSites;
}
