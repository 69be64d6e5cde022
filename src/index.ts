export { HealthProbe, parseSample, type FetchLike, type HealthProbeOptions } from './monitor/healthProbe.js';
export { FailureDetector, type DetectorState, type DetectorStep } from './monitor/failureDetector.js';
export { FailoverController, type FailoverState, type FailoverSettings } from './monitor/failoverController.js';
export { MonitorLoop, type MonitorLoopOptions, type MonitorTransitionEvent } from './monitor/monitorLoop.js';
export { formatMonitorStatus, formatProbeReport } from './monitor/status.js';
export * from './monitor/types.js';
export {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  parseReturnBehavior,
  resolveMonitorConfig,
  resolveProbeSettings,
  type ConfigProvider,
  type LinkwatchConfig,
  type MonitorConfig,
  type ProbeSettings,
  type ReturnBehavior
} from './config/index.js';
export * from './errors.js';
export { EventBusNotifier, type NotificationSeverity, type NotificationSink } from './notify/index.js';
export { DryRunSceneSwitcher, type SceneSwitcher } from './scenes/index.js';
export { PanelRegistry, renderProbePanel, renderStatusPanel, type PanelContent, type Updatable } from './panels/index.js';
export { dispatchPanelAction, isPanelAction, PANEL_ACTION_IDS, type PanelActionId } from './panels/actions.js';
export { startMonitorService, type MonitorService, type MonitorServiceOptions } from './run-monitor.js';
