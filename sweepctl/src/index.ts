export { loadConfig, deepMerge, applyEnvOverrides, defaultConfigDir } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { buildSweepPlan, peakLimitFor, DEFAULT_CONFIRM, DEFAULT_PEAK, DEFAULT_TIMING } from "./config/plan.js";
export { expandRange } from "./core/ranges.js";
export { nextState, isTerminal, ENGINE_STATES } from "./core/state-machine.js";
export type { EngineEvent, EngineState } from "./core/state-machine.js";
export { SweepEngine } from "./core/sweep-engine.js";
export type { EngineResult, LoadUnit, SourceUnit, SweepEngineDeps } from "./core/sweep-engine.js";
export { SourceController } from "./instruments/source-controller.js";
export type { SourceReading, SourceSettings } from "./instruments/source-controller.js";
export { LoadController } from "./instruments/load-controller.js";
export type { LoadReading } from "./instruments/load-controller.js";
export { createBench } from "./instruments/factory.js";
export { formatSafetyTable, parseSafetyTable, SAFETY_FIELDS } from "./instruments/safety-table.js";
export type { SafetyTable } from "./instruments/safety-table.js";
export { AbortFlag, KeypressAbortMonitor } from "./monitor/abort-monitor.js";
export type { AbortMonitor } from "./monitor/abort-monitor.js";
export { CompositeResultSink, MemoryResultSink } from "./sinks/result-sink.js";
export type { ResultSink } from "./sinks/result-sink.js";
export { RunDirectorySink } from "./sinks/run-directory-sink.js";
export { TableResultSink } from "./sinks/table-sink.js";
export { SocketTransport } from "./transport/socket-transport.js";
export { GpibGatewayTransport, parseGpibResource } from "./transport/gpib-gateway-transport.js";
export type { InstrumentTransport } from "./transport/transport.js";
export { createSimulatedBench } from "./simulation/bench.js";
export type { SimulatedBench } from "./simulation/bench.js";
export { SimulatedTransport } from "./simulation/simulated-transport.js";
export type { FaultInjection } from "./simulation/simulated-transport.js";
export { run, makeRunId } from "./commands/run.js";
export { safety } from "./commands/safety.js";
export { validateBench } from "./commands/validate.js";
export { EXIT, exitCodeFor } from "./commands/exit-codes.js";
export {
  BenchError,
  ConfigurationError,
  InstrumentFault,
  TransportError,
  TransportTimeout,
} from "./utils/errors.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export type * from "./types/plan.js";
export type * from "./types/run.js";
export type * from "./types/config.js";
