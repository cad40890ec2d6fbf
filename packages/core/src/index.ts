/**
 * @unified-ui/core
 *
 * Host-agnostic core: style model, IUR element tree and builder, renderer
 * state, the terminal, desktop and web renderers, signals and the coordinator.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors, results and warnings
// =============================================================================

export {
  UiError,
  type UiErrorCode,
  type Ok,
  type Err,
  type Result,
  type Check,
  OK_CHECK,
  ok,
  err,
} from "./errors.js";
export { DEV_MODE, type WarnFn, warnDev, warnPrefix } from "./devWarn.js";
export { deepEqual, deepMerge } from "./internal/equal.js";

// =============================================================================
// Styles
// =============================================================================

export {
  type RgbColor,
  type Color,
  TEXT_ATTRS,
  type TextAttr,
  STYLE_ALIGNS,
  type StyleAlign,
  type Style,
  STYLE_KEYS,
  EMPTY_STYLE,
  createStyle,
  mergeStyles,
  mergeManyStyles,
  isEmptyStyle,
} from "./style/style.js";
export {
  type NamedStyle,
  type StyleRegistry,
  type StyleRefError,
  createStyleRegistry,
  resolveStyle,
  resolveStyleRef,
  validateStyleRef,
  getAllStyles,
} from "./style/resolver.js";

// =============================================================================
// IUR
// =============================================================================

export type {
  SignalHandler,
  InputType,
  CellAlign,
  SortDirection,
  BoxAlign,
  BoxJustify,
  ChartOrientation,
  ChartDatum,
  TableRow,
  CellFormatter,
  TextElement,
  ButtonElement,
  LabelElement,
  TextInputElement,
  GaugeElement,
  SparklineElement,
  BarChartElement,
  LineChartElement,
  ColumnElement,
  TableElement,
  MenuItemElement,
  MenuElement,
  ContextMenuElement,
  TabElement,
  TabsElement,
  TreeNodeElement,
  TreeViewElement,
  VBoxElement,
  HBoxElement,
  IurElement,
  ElementKind,
  ElementOfKind,
  ElementMetadata,
} from "./iur/types.js";
export { ELEMENT_KINDS } from "./iur/types.js";
export {
  isIurElement,
  elementChildren,
  elementMetadata,
  isVisible,
  describeKind,
} from "./iur/element.js";
export { type ElementProps, iur } from "./iur/factories.js";
export {
  type TraverseOrder,
  type TraverseOptions,
  type IurIssue,
  traverseIur,
  findById,
  findByIdOrThrow,
  collectStyles,
  countElements,
  countByType,
  getAllIds,
  validateIur,
} from "./iur/traverse.js";
export { verifyUniqueIds, verifyLabelRefs, verifyTree } from "./iur/verify.js";

// =============================================================================
// Builder
// =============================================================================

export {
  type AttrRecord,
  type AttrPair,
  type AttrList,
  type AttrSource,
  isPlainRecord,
  attrEntries,
  readAttr,
  hasAttr,
} from "./attrs.js";
export {
  type SourceEntity,
  sourceEntity,
  normalizeAttrs,
  normalizeKind,
  parseSourceEntities,
} from "./builder/entity.js";
export {
  type BuildOptions,
  type ValidationError,
  build,
  buildEntity,
  extractNestedEntities,
  validate,
} from "./builder/builder.js";

// =============================================================================
// Tables and forms
// =============================================================================

export { getRowValue, compareValues, sortRows } from "./table/sort.js";
export {
  type FormValues,
  type FieldError,
  type FieldRule,
  formInputIds,
  collectFormData,
  buildFormSubmitPayload,
  validateRequired,
  validateEmail,
  validateLength,
  NAMED_PATTERNS,
  validateFormat,
  validateForm,
} from "./forms/forms.js";

// =============================================================================
// Security and signals
// =============================================================================

export {
  type SignalData,
  MOUSE_ACTIONS,
  WINDOW_ACTIONS,
  KEY_ACTIONS,
  FOCUS_ACTIONS,
  type MouseAction,
  type WindowAction,
  type KeyAction,
  type FocusAction,
  lookupEventAction,
  validateEventAction,
  type PayloadLimits,
  PAYLOAD_LIMITS,
  type PayloadError,
  estimateSize,
  measureDepth,
  validatePayload,
  MAX_SANITIZED_LENGTH,
  REDACTED,
  SENSITIVE_KEY_PATTERNS,
  type SanitizeError,
  stripMarkup,
  sanitize,
  isSensitiveKey,
  redact,
  type SecureError,
  secure,
  MAX_ERROR_TEXT_LENGTH,
  sanitizeForError,
} from "./security/security.js";
export {
  DEFAULT_NAMESPACE,
  DEFAULT_SIGNAL_SOURCE,
  STANDARD_SIGNALS,
  type StandardSignalName,
  type Signal,
  type SignalOptions,
  type SignalError,
  isStandardSignalName,
  standardSignalNames,
  isValidSegment,
  isValidSignalType,
  signalType,
  createSignal,
  createSignalOrThrow,
} from "./signals/signals.js";

// =============================================================================
// Renderers
// =============================================================================

export {
  PLATFORMS,
  type Platform,
  isPlatformName,
  type RendererConfig,
  type RendererMetadata,
  type RendererState,
  type CreateStateOptions,
  createRendererState,
  putRoot,
  getRootOrThrow,
  bumpVersion,
  getConfig,
  putConfig,
  getMetadata,
  putMetadata,
  putWidget,
  getWidget,
  hasWidget,
  deleteWidget,
  widgetIds,
  widgetCount,
  isPlatform,
} from "./renderer/state.js";
export {
  LAST_IUR_KEY,
  type RenderError,
  type ConvertFn,
  type Renderer,
  type CreateRendererOptions,
  createRenderer,
} from "./renderer/lifecycle.js";
export {
  barChartText,
  gaugeText,
  lineChartText,
  sparklineText,
  tableText,
  formatCellValue,
} from "./renderer/charts.js";
export {
  type PlatformEventType,
  WEB_HOOKS,
  type WebHook,
  PLATFORM_SOURCES,
  platformEventTypes,
  type EventSignalOptions,
  type EventError,
  toPlatformSignal,
  getHandler,
  type ElementSignal,
  type ElementSignalError,
  buildElementSignal,
  normalizePayload,
  validateSignalShape,
  extractEventMetadata,
  type HandlerMap,
} from "./renderer/events.js";

export {
  type TerminalStyle,
  type TerminalNode,
  collectText,
  renderPlainText,
} from "./renderer/terminal/nodes.js";
export {
  type TerminalRendererOptions,
  createTerminalRenderer,
  terminalRenderer,
} from "./renderer/terminal/renderer.js";
export * as terminalEvents from "./renderer/terminal/events.js";

export { type DesktopWidget, type DesktopWidgetType, walkWidgets } from "./renderer/desktop/widgets.js";
export {
  type DesktopRendererOptions,
  createDesktopRenderer,
  desktopRenderer,
} from "./renderer/desktop/renderer.js";
export * as desktopEvents from "./renderer/desktop/events.js";

export { escapeHtml } from "./renderer/web/html.js";
export { toCss } from "./renderer/web/style.js";
export { type WebRendererOptions, createWebRenderer, webRenderer } from "./renderer/web/renderer.js";
export * as webEvents from "./renderer/web/events.js";

// =============================================================================
// Coordinator
// =============================================================================

export {
  type PlatformEnv,
  PLATFORM_ENV_KEY,
  WEB_ENV_KEY,
  DESKTOP_SESSION_KEYS,
  detectPlatform,
  isTerminal,
  isDesktop,
  isWeb,
} from "./coordinator/platform.js";
export {
  type EmitterTarget,
  type CallbackTarget,
  type RemoteCallTarget,
  type DispatchTarget,
  type DeliveryError,
  type DeliveryFailure,
  isDispatchTarget,
} from "./coordinator/targets.js";
export {
  DEFAULT_RENDER_TIMEOUT_MS,
  type AnyRenderer,
  type AnyRendererState,
  type PlatformRenderError,
  type PlatformResult,
  type PlatformResults,
  type RenderOnOptions,
  type ConcurrentRenderOptions,
  supportsPlatform,
  availableRenderers,
  selectRenderer,
  selectRenderers,
  renderOn,
  renderAll,
  concurrentRender,
  mergeStates,
  conflictResolution,
  type DispatchError,
  type DispatchFailed,
  type BroadcastError,
  type DispatchOptions,
  dispatchEvent,
  broadcastEvent,
} from "./coordinator/coordinator.js";
