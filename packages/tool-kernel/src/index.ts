/**
 * @toolgate/tool-kernel
 */

export {
  DEFAULT_PHASE_POLICY,
  defaultPhaseGuard,
  extractOperation,
  getBlockedReason,
  isAllowed,
  PhaseGuard,
} from './phase-guard.js';
export type { ToolKernelOptions } from './tool-kernel.js';
export { ToolKernel } from './tool-kernel.js';
export { buildMemoryTools } from './tools/memory-tools.js';
