/**
 * Main entry point - exports all public APIs
 */

export { AsyncDispatcher, NodeDetachedLauncher, buildReinvocationArgs } from './async_dispatcher';
export type { DetachedLauncher, DispatchRequest } from './async_dispatcher';
export { JavaAgentAttachClient } from './attach_client';
export type { AttachClient, AttachRequest, AttachResult } from './attach_client';
export { AttachRetryEngine } from './attach_retry';
export type { AttachAttempt, AttachOutcome } from './attach_retry';
export { FaultlineCLI, buildPrepareCommand, parsePrepareFlags } from './cli';
export type { Collaborators } from './cli';
export { loadConfig } from './config';
export type { FaultlineConfig } from './config';
export { LocalPortAllocator } from './port_allocator';
export type { PortAllocator } from './port_allocator';
export { PrepareCommand } from './prepare_command';
export { PreparationCoordinator } from './preparation_coordinator';
export type { PrepareRequest, Resolution } from './preparation_coordinator';
export { SqlitePreparationStore, recordToJson } from './preparation_store';
export type {
    InsertOutcome,
    NewPreparation,
    PreparationRecord,
    PreparationStatus,
    PreparationStore
} from './preparation_store';
export { PsProcessResolver } from './process_resolver';
export type { ProcessResolver } from './process_resolver';
export type { CommandResponse } from './response';
export { ResultReporter } from './result_reporter';
export type { ReportOutcome } from './result_reporter';
export { ErrorFactory, PreparationError } from './structured_error';
export type { ErrorCode } from './structured_error';
export { SandboxTokenPortLookup } from './token_port_lookup';
export type { PortLookup } from './token_port_lookup';
