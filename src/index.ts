export { LagRelay, DEFAULT_LISTEN_HOST } from './relays/tcp/relay';
export type { lagrelay_options_t } from './relays/tcp/relay';
export { DelayPolicy } from './relays/tcp/delay_policy/DelayPolicy.class';
export type { delay_policy_options_t } from './relays/tcp/delay_policy/DelayPolicy.class';
export {
  BacklogQueue,
  createBacklogEntry
} from './relays/tcp/backlog_queue/BacklogQueue.class';
export type {
  backlog_entry_t,
  backlog_queue_options_t
} from './relays/tcp/backlog_queue/BacklogQueue.class';
export { LagRelayPipe } from './relays/tcp/pipe/LagRelayPipe.class';
export type {
  lagrelay_pipe_options_t,
  lagrelay_pipe_result_t
} from './relays/tcp/pipe/LagRelayPipe.class';
export { LagRelayConnectionPair } from './relays/tcp/connection_pair/LagRelayConnectionPair.class';
export { ActivePipeRegistry } from './relays/tcp/registry/ActivePipeRegistry.class';
export { LagRelayLogger } from './relays/tcp/logger/LagRelayLogger.class';
export type { lagrelay_logger_options_t } from './relays/tcp/logger/LagRelayLogger.class';
