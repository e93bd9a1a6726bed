export const MODULE_KINDS = [
    'CommonModule',
    'ObjectModule',
    'ManagerModule',
    'FormModule',
    'CommandModule',
    'RecordSetModule',
    'ValueManagerModule',
    'SessionModule',
    'ManagedApplicationModule',
    'OrdinaryApplicationModule',
    'ExternalConnectionModule',
    'BSLModule'
] as const;

export type ModuleKind = (typeof MODULE_KINDS)[number];

// Module kinds and their key forms (the module file name inside a configuration dump).
// Key forms are what the reference index stores, so they must stay unique.
export const MODULE_KIND_KEYS: Record<ModuleKind, string> = {
    CommonModule: 'Module.bsl',
    ObjectModule: 'ObjectModule.bsl',
    ManagerModule: 'ManagerModule.bsl',
    FormModule: 'Form/Module.bsl',
    CommandModule: 'CommandModule.bsl',
    RecordSetModule: 'RecordSetModule.bsl',
    ValueManagerModule: 'ValueManagerModule.bsl',
    SessionModule: 'SessionModule.bsl',
    ManagedApplicationModule: 'ManagedApplicationModule.bsl',
    OrdinaryApplicationModule: 'OrdinaryApplicationModule.bsl',
    ExternalConnectionModule: 'ExternalConnectionModule.bsl',
    BSLModule: '*.bsl'
};

// Metadata folder in a configuration dump -> metadata type used in module refs
export const METADATA_FOLDERS: Record<string, string> = {
    'CommonModules': 'CommonModule',
    'CommonForms': 'CommonForm',
    'CommonCommands': 'CommonCommand',
    'Catalogs': 'Catalog',
    'Documents': 'Document',
    'DataProcessors': 'DataProcessor',
    'Reports': 'Report',
    'InformationRegisters': 'InformationRegister',
    'AccumulationRegisters': 'AccumulationRegister',
    'AccountingRegisters': 'AccountingRegister',
    'CalculationRegisters': 'CalculationRegister',
    'ChartsOfAccounts': 'ChartOfAccounts',
    'ChartsOfCharacteristicTypes': 'ChartOfCharacteristicTypes',
    'ChartsOfCalculationTypes': 'ChartOfCalculationTypes',
    'BusinessProcesses': 'BusinessProcess',
    'Tasks': 'Task',
    'ExchangePlans': 'ExchangePlan',
    'Constants': 'Constant',
    'Enums': 'Enum'
};

// Manager collections as written in source (lowercase) -> metadata type
export const MANAGER_COLLECTIONS: Record<string, string> = {
    'catalogs': 'Catalog',
    'справочники': 'Catalog',
    'documents': 'Document',
    'документы': 'Document',
    'dataprocessors': 'DataProcessor',
    'обработки': 'DataProcessor',
    'reports': 'Report',
    'отчеты': 'Report',
    'informationregisters': 'InformationRegister',
    'регистрысведений': 'InformationRegister',
    'accumulationregisters': 'AccumulationRegister',
    'регистрынакопления': 'AccumulationRegister',
    'exchangeplans': 'ExchangePlan',
    'планыобмена': 'ExchangePlan',
    'businessprocesses': 'BusinessProcess',
    'бизнеспроцессы': 'BusinessProcess',
    'tasks': 'Task',
    'задачи': 'Task',
    'enums': 'Enum',
    'перечисления': 'Enum'
};

// Words that may be followed by "(" but never name a method of the module
export const KEYWORDS = new Set([
    'if', 'elsif', 'while', 'for', 'return', 'new', 'not', 'and', 'or', 'raise', 'await',
    'если', 'иначеесли', 'пока', 'для', 'возврат', 'новый', 'не', 'и', 'или', 'вызватьисключение', 'ждать'
]);

export const METHOD_START_PATTERN = /^(\s*)(?:(?:async|асинх)\s+)?(procedure|function|процедура|функция)\s+([\p{L}_][\p{L}\p{N}_]*)\s*(?:\(([^)]*)\)?)?\s*(export|экспорт)?/iu;
export const METHOD_END_PATTERN = /^(\s*)(endprocedure|endfunction|конецпроцедуры|конецфункции)(?![\p{L}\p{N}_])/iu;
export const REGION_START_PATTERN = /^(\s*)#(?:region|область)\s+([\p{L}_][\p{L}\p{N}_]*)/iu;
export const REGION_END_PATTERN = /^(\s*)#(?:endregion|конецобласти)(?![\p{L}\p{N}_])/iu;

export const BSL_EXTENSIONS = ['.bsl', '.os'];
