export { LedgerKernel } from './ledger-core/Kernel.js';
export type { Commit, KernelLifecycle } from './ledger-core/Kernel.js';
export { createLedgerConfig, DEFAULT_COMPLIANCE_POLICY } from './ledger-core/Config.js';
export type { CompliancePolicy, LedgerConfig, LedgerConfigInput, ZeroHarvestPolicy } from './ledger-core/Config.js';
export { ErrorCategory, LedgerError, LedgerErrorCode, LedgerIntegrityError } from './ledger-core/Errors.js';
export * from './ledger-core/L0/Primitives.js';
export { ledgerCallSchema, callContextSchema } from './ledger-core/L0/Calls.js';
export type { LedgerCall, LedgerOperation } from './ledger-core/L0/Calls.js';
export { LEDGER_INVARIANTS, checkInvariants } from './ledger-core/L0/Invariants.js';
export { ReplayEngine } from './ledger-core/L0/Replay.js';
export { StateModel, genesisState, stateRoot } from './ledger-core/L2/State.js';
export type {
    Asset, ComplianceRecord, DividendClaim, LedgerState, MarketPrice, Proposal, ShareBalance, StateSnapshot, VoteRecord
} from './ledger-core/L2/State.js';
export { PROPOSAL_MIN_STAKE } from './ledger-core/L4/Governance.js';
export type { ProposalStatus } from './ledger-core/L4/Governance.js';
export { AuditLog } from './ledger-core/L5/Audit.js';
export type { Evidence, EvidenceStatus, IEventStore } from './ledger-core/L5/Audit.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { loadServiceConfig } from './Platform/Config.js';
export type { ServiceConfig } from './Platform/Config.js';
export { SequencedBlockClock } from './Platform/Ports.js';
export type { IBlockClock } from './Platform/Ports.js';
export { LedgerServer, CALLER_HEADER } from './server/Server.js';
