// 선택 계층 진입점

export { filterByCategories, summarizeCategories } from './categoryFilter';
export type { CategorySummary } from './categoryFilter';

export { getSccmPackages, SCCM_TITLE_MARKER, SCCM_PACKAGE_EXTENSION } from './sccmFilter';

export { parseSelectionInput, validatePresetIndices } from './indexSelection';

export { PresetSelectionProvider, InteractiveSelectionProvider } from './selectionProvider';
export type { InteractiveSelectionOptions } from './selectionProvider';
