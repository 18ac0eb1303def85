/**
 * toolgate: Meta-package that re-exports all toolgate packages.
 */

export * from '@toolgate/core';
export * as Generation from '@toolgate/generation';
export * as ToolKernel from '@toolgate/tool-kernel';
export * as EngineAdapter from '@toolgate/engine-adapter';
export * as Memory from '@toolgate/memory';
export * as Observability from '@toolgate/observability';
export * as Context from '@toolgate/context';
export * as Skills from '@toolgate/skills';
