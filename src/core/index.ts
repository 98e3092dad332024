export { createRunContext } from './context.js';
export type { RunContext } from './context.js';
export { orchestrateScan } from './scan.js';
export type { ScanReport } from './scan.js';
export {
  orchestrateApply,
  orchestrateRestore,
  orchestrateListBackups,
  orchestrateSuggest,
} from './deletions.js';
