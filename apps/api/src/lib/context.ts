import type { RiskweaveConfig } from '@riskweave/config';
import { bandAtLeast, type DetectionOrchestrator, type SignalInput, type VerdictResult } from '@riskweave/core';
import type { AlertFeed } from './alertFeed.js';
import type { SessionRegistry } from './sessions.js';

/**
 * Long-lived services shared by every route
 */
export interface AppContext {
  config: RiskweaveConfig;
  orchestrator: DetectionOrchestrator;
  sessions: SessionRegistry;
  alerts: AlertFeed;
  startedAt: number;
}

export type AppRouteOptions = { ctx: AppContext };

/**
 * Run the full pipeline in a session and push an alert when the verdict
 * reaches the configured band
 */
export async function detectAndAlert(
  ctx: AppContext,
  signal: SignalInput,
  session: string,
  source: string,
): Promise<VerdictResult> {
  const verdict = await ctx.orchestrator.detect(signal, ctx.sessions.acquire(session));

  if (bandAtLeast(verdict.riskBand, ctx.config.alerts.minBand)) {
    ctx.alerts.push({
      title: `${verdict.riskBand} risk signal (${verdict.unifiedRiskScore}/100)`,
      message: verdict.attribution.topFactors.join(', '),
      riskBand: verdict.riskBand,
      source,
      session,
      signalId: verdict.signalId,
      unifiedRiskScore: verdict.unifiedRiskScore,
      metadata: { action: verdict.action, isCoordinated: verdict.campaign.isCoordinated },
    });
  }

  return verdict;
}
