/**
 * @fileoverview Orchestrator module
 *
 * `createOrchestrator` is the entry point; the facade it returns serves the
 * CLI and the MCP server alike.
 *
 * @packageDocumentation
 */

export { createOrchestrator, type CreateOrchestratorOptions } from './bootstrap.js';
export * from './orchestration_facade.js';
export { BackendHealthMonitor, type BackendStatus, type BackendHealthMonitorOptions } from './backend_health.js';
