import { errorMessage } from './errors.js';
import type { FetchWithTimeout } from './http-client.js';
import type { SnowLocation } from './locations.js';
import type { AlertDecision, CycleReport } from './orchestrator.js';
import type { SeverityTier } from './severity.js';
import { PROVIDER_LABELS } from './snow-record.js';
import { formatAlertTimestamp } from './time.js';
import { formatInches } from './weather.js';

export const DEFAULT_ALERT_TIME_ZONE = 'America/Denver';
const MAX_STATUS_LIST_ITEMS = 5;

interface PlainTextObject {
  type: 'plain_text';
  text: string;
}

interface MarkdownObject {
  type: 'mrkdwn';
  text: string;
}

export type SlackBlock =
  | { type: 'header'; text: PlainTextObject }
  | { type: 'section'; text: MarkdownObject }
  | { type: 'context'; elements: MarkdownObject[] };

export interface SlackMessage {
  text: string;
  blocks: SlackBlock[];
}

export interface SentAlert {
  locationId: string;
  locationName: string;
  tier: SeverityTier;
  snowInches: number;
}

const TIER_EMOJI: Record<SeverityTier, string> = {
  none: '',
  light: '❄️',
  moderate: '🏂',
  heavy: '🏔️',
};

const titleCase = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

const section = (text: string): SlackBlock => ({ type: 'section', text: { type: 'mrkdwn', text } });

const bulletList = (lines: string[], total: number): string => {
  const shown = lines.slice(0, MAX_STATUS_LIST_ITEMS).map((line) => `• ${line}`);
  if (total > MAX_STATUS_LIST_ITEMS) {
    shown.push(`• ...and ${total - MAX_STATUS_LIST_ITEMS} more`);
  }
  return shown.join('\n');
};

const describeVerification = (decision: AlertDecision): string | null => {
  const secondary = decision.secondaryRecord;
  if (decision.verification === 'corroborated' && secondary) {
    return `Verified against ${PROVIDER_LABELS[secondary.sourceId]} (difference ${formatInches(decision.disagreementInches)})`;
  }
  if (decision.reducedConfidence) {
    const why = decision.secondaryErrorMessage ? 'the secondary source was unavailable' : 'it was not cross-checked';
    return `:warning: Single-source reading: ${why}. Treat this amount with reduced confidence.`;
  }
  return null;
};

interface BuildSnowAlertMessageOptions {
  timeZone?: string;
}

export const buildSnowAlertMessage = (
  decision: AlertDecision,
  location: SnowLocation,
  { timeZone = DEFAULT_ALERT_TIME_ZONE }: BuildSnowAlertMessageOptions = {},
): SlackMessage => {
  const title = `${TIER_EMOJI[decision.tier]} ${titleCase(decision.tier)} Snow Alert: ${location.name}`;
  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: title } },
    section(`*${decision.verifiedSnowInches.toFixed(1)} inches* of fresh snow at *${location.name}*!`),
  ];

  const verificationNote = describeVerification(decision);
  if (verificationNote) {
    blocks.push(section(verificationNote));
  }

  const metadata = [`Elevation: ${location.elevationFt.toLocaleString('en-US')} ft`];
  if (location.region) {
    metadata.push(`Region: ${location.region}`);
  }
  metadata.push(`<${location.website}|Resort Website>`);
  blocks.push(section(metadata.join(' | ')));

  const forecastInches = decision.primaryRecord?.forecastSnowInches ?? 0;
  if (forecastInches > 0) {
    blocks.push(section(`*Forecast*: Additional ${forecastInches.toFixed(1)} inches expected in the next 24 hours.`));
  }

  const recordedAt = decision.primaryRecord?.observationTime;
  if (recordedAt) {
    blocks.push({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `Recorded at: ${formatAlertTimestamp(recordedAt, timeZone)}` }],
    });
  }

  return { text: title, blocks };
};

export const buildStatusUpdateMessage = (report: CycleReport, sentAlerts: SentAlert[], timeZone: string = DEFAULT_ALERT_TIME_ZONE): SlackMessage => {
  const failed = report.decisions.filter((decision) => decision.errorClass !== null);
  const status = failed.length ? '⚠️ Issues detected' : '✅ Operational';
  const title = `Snowfall Alert System Status: ${status}`;

  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: title } },
    section(`*${status}*\n*Time:* ${formatAlertTimestamp(report.evaluatedAt, timeZone)}\n*Locations Checked:* ${report.locationsProcessed}`),
  ];

  if (sentAlerts.length) {
    const lines = sentAlerts.map((alert) => `${alert.locationName}: ${formatInches(alert.snowInches)} - ${alert.tier} alert`);
    blocks.push(section(`*Alerts Sent (${sentAlerts.length}):*\n${bulletList(lines, lines.length)}`));
  } else if (report.alertsTriggered > 0) {
    blocks.push(section(`*Alerts Triggered:* ${report.alertsTriggered}`));
  }

  if (failed.length) {
    const lines = failed.map((decision) => `${decision.locationName}: ${decision.errorClass}: ${decision.errorMessage}`);
    blocks.push(section(`*Errors (${failed.length}):*\n${bulletList(lines, lines.length)}`));
  }

  const depths = report.decisions
    .flatMap((decision) => (decision.primaryRecord ? [{ name: decision.locationName, inches: decision.primaryRecord.observedSnowInches }] : []))
    .sort((a, b) => b.inches - a.inches);
  if (depths.length) {
    const lines = depths.map((entry) => `${entry.name}: ${formatInches(entry.inches)}`);
    blocks.push(section(`*Top Snow Depths:*\n${bulletList(lines, lines.length)}`));
  }

  return { text: title, blocks };
};

export interface AlertNotifier {
  notifyAlert: (decision: AlertDecision, location: SnowLocation) => Promise<boolean>;
  sendStatusUpdate: (report: CycleReport, sentAlerts: SentAlert[]) => Promise<boolean>;
}

interface CreateSlackNotifierOptions {
  webhookUrl: string;
  monitoringWebhookUrl?: string;
  fetchWithTimeout: FetchWithTimeout;
  disabled?: boolean;
  timeZone?: string;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Posts to Slack incoming webhooks. Delivery failures are logged and reported as `false`;
 * they never reach the cycle. With `disabled` set, messages are rendered but not sent.
 */
export const createSlackNotifier = ({
  webhookUrl,
  monitoringWebhookUrl = '',
  fetchWithTimeout,
  disabled = false,
  timeZone = DEFAULT_ALERT_TIME_ZONE,
  maxAttempts = 2,
  retryDelayMs = 1000,
  sleep = defaultSleep,
}: CreateSlackNotifierOptions): AlertNotifier => {
  const post = async (url: string, message: SlackMessage, label: string): Promise<boolean> => {
    if (disabled) {
      console.log(`[slack] notifications disabled, skipping ${label}`);
      return true;
    }
    if (!url) {
      console.error(`[slack] no webhook configured for ${label}`);
      return false;
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const response = await fetchWithTimeout(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(message),
        });
        if (response.ok) {
          return true;
        }
        console.error(`[slack] ${label} rejected with status ${response.status} (attempt ${attempt}/${maxAttempts})`);
      } catch (err) {
        console.error(`[slack] ${label} failed (attempt ${attempt}/${maxAttempts}):`, errorMessage(err));
      }
      if (attempt < maxAttempts) {
        await sleep(retryDelayMs * attempt);
      }
    }
    return false;
  };

  return {
    notifyAlert: async (decision, location) => {
      if (!decision.shouldNotify) {
        console.warn(`[slack] refusing to send a suppressed decision for ${decision.locationId}`);
        return false;
      }
      console.log(`[slack] sending ${decision.tier} alert for ${location.name} (${formatInches(decision.verifiedSnowInches)})`);
      return post(webhookUrl, buildSnowAlertMessage(decision, location, { timeZone }), `alert for ${location.id}`);
    },
    sendStatusUpdate: (report, sentAlerts) =>
      post(monitoringWebhookUrl || webhookUrl, buildStatusUpdateMessage(report, sentAlerts, timeZone), 'status update'),
  };
};
