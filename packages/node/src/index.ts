/**
 * @unified-ui/node
 *
 * Node.js host binding: environment platform detection, validated coordinator
 * configuration and an EventEmitter signal bus.
 */

export {
  type NodeCoordinatorConfig,
  type ResolvedNodeConfig,
  parseNamespace,
  parsePlatforms,
  parseTimeoutMs,
  resolveNodeConfig,
} from "./config.js";
export { type SignalBus, type SignalListener, createSignalBus } from "./signalBus.js";
export { type NodeCoordinator, createNodeCoordinator } from "./coordinator.js";
export { detectHostPlatform } from "./env.js";
