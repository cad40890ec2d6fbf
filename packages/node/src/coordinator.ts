/**
 * packages/node/src/coordinator.ts — Coordinator bound to a Node host.
 */

import {
  type BroadcastError,
  type DispatchError,
  type DispatchTarget,
  type Platform,
  type PlatformResults,
  type RendererConfig,
  type Result,
  type Signal,
  type SignalData,
  broadcastEvent,
  concurrentRender,
  detectPlatform,
  dispatchEvent,
  renderOn,
} from "@unified-ui/core";
import { type NodeCoordinatorConfig, type ResolvedNodeConfig, resolveNodeConfig } from "./config.js";
import { type SignalBus, createSignalBus } from "./signalBus.js";

export type NodeCoordinator = Readonly<{
  config: ResolvedNodeConfig;
  /** Platform detected from the configured environment. */
  platform: Platform;
  bus: SignalBus;
  render(iur: unknown, config?: RendererConfig): Result<PlatformResults, never>;
  renderConcurrent(iur: unknown, config?: RendererConfig): Promise<Result<PlatformResults, never>>;
  /** Events are attributed to the detected platform; `target` defaults to the bus. */
  dispatch(eventType: string, data: SignalData, target?: DispatchTarget): Result<Signal, DispatchError>;
  broadcast(
    eventType: string,
    data: SignalData,
    targets: readonly DispatchTarget[],
  ): Result<Signal, BroadcastError>;
}>;

export function createNodeCoordinator(config: NodeCoordinatorConfig = {}): NodeCoordinator {
  const resolved = resolveNodeConfig(config);
  const platform = detectPlatform(resolved.env);
  const bus = createSignalBus();
  const eventOpts = { namespace: resolved.namespace, warn: resolved.warn };

  return Object.freeze({
    config: resolved,
    platform,
    bus,
    render: (iur: unknown, rendererConfig: RendererConfig = {}) =>
      renderOn(iur, resolved.platforms, { config: rendererConfig, warn: resolved.warn }),
    renderConcurrent: (iur: unknown, rendererConfig: RendererConfig = {}) =>
      concurrentRender(iur, resolved.platforms, {
        config: rendererConfig,
        warn: resolved.warn,
        timeoutMs: resolved.timeoutMs,
      }),
    dispatch: (eventType: string, data: SignalData, target: DispatchTarget = bus) =>
      dispatchEvent(platform, eventType, data, target, eventOpts),
    broadcast: (eventType: string, data: SignalData, targets: readonly DispatchTarget[]) =>
      broadcastEvent(platform, eventType, data, targets, eventOpts),
  });
}
