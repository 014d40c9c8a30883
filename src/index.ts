/**
 * Public surface of the leveraged outcome market engine.
 */

export * from './types';
export * from './config/constants';
export { MarketError, isMarketError } from './core/errors';
export type { MarketErrorCode, ErrorDetails } from './core/errors';
export * as marketMath from './core/marketMath';
export { MarketEngine, DEFAULT_MARKET_PARAMS } from './engine/MarketEngine';
export type { MarketInitParams, MarketSnapshot } from './engine/MarketEngine';
export type { MarketEventListener } from './engine/events';
export type { CurveFill } from './capital/bondingCurveLedger';
export type { ClosePositionResult, LiquidationResult } from './engine/positionLedger';
export type { ClaimResult, ResolutionResult } from './engine/settlementGuardian';
export * from './auth/authorization';
export * from './services/collaborators';
export { TokenLedger } from './services/tokenLedger';
export { InProcessCustodyVault } from './services/custodyVault';
export { InProcessLendingPool } from './services/lendingPool';
export { InProcessInsuranceFund } from './services/insuranceFund';
export { OutcomeToken } from './services/outcomeToken';
export { SupabaseEventSink } from './services/eventSink';
export { bootstrap, collaboratorAddress } from './bootstrap';
export type { MarketRuntime, BootstrapOptions } from './bootstrap';
export { parseMarketConfig, loadMarketConfig, ConfigError } from './config/marketConfig';
export type { MarketConfig } from './config/marketConfig';
export { createDashboardApp } from './dashboard/server';
export { ManualClock, systemClock } from './utils/clock';
export { formatUnits, parseUnits } from './utils/units';
