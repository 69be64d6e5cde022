import type { ConfigProvider } from '../config/index.js';
import type { MonitorLoop } from '../monitor/monitorLoop.js';
import { renderProbePanel, renderStatusPanel, type PanelContent, type Updatable } from './index.js';

export type PanelActionContext = {
  loop: MonitorLoop;
  config: ConfigProvider;
};

type PanelActionHandler = (context: PanelActionContext) => Promise<PanelContent>;

const PANEL_ACTIONS = Object.freeze({
  refresh: async ({ loop, config }: PanelActionContext) => renderStatusPanel(loop.status(), config.getConfig()),
  test: async ({ loop }: PanelActionContext) => renderProbePanel(await loop.testProbeNow()),
  debug: async ({ loop }: PanelActionContext) => renderProbePanel(await loop.testProbeNow(), { raw: true }),
  toggle: async ({ loop, config }: PanelActionContext) => {
    if (loop.isRunning()) {
      await loop.stop();
    } else {
      loop.start();
    }
    return renderStatusPanel(loop.status(), config.getConfig());
  }
} satisfies Record<string, PanelActionHandler>);

export type PanelActionId = keyof typeof PANEL_ACTIONS;

export const PANEL_ACTION_IDS = Object.freeze(Object.keys(PANEL_ACTIONS));

export function isPanelAction(id: string): id is PanelActionId {
  return Object.prototype.hasOwnProperty.call(PANEL_ACTIONS, id);
}

/**
 * Runs the handler registered for `actionId` and, when a target is given,
 * displays the result on it.
 */
export async function dispatchPanelAction(
  actionId: string,
  context: PanelActionContext,
  target?: Updatable
): Promise<PanelContent> {
  if (!isPanelAction(actionId)) {
    throw new Error(`Unknown panel action "${actionId}" (available: ${PANEL_ACTION_IDS.join(', ')})`);
  }

  const content = await PANEL_ACTIONS[actionId](context);
  if (target) {
    await target.display(content);
  }
  return content;
}
