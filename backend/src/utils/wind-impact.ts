import { assertWeatherSample, ContractViolationError, type WeatherSample } from './contracts.js';
import { type ImpactThresholds, withImpactThresholds } from './thresholds.js';
import { hoursBetweenMs, parseIsoTimeToMs, type TimeInput, toEpochMs } from './time.js';

export type TurbineStatus = 'normal' | 'idle' | 'sub_optimal' | 'icing_risk' | 'shutdown';
export type ImpactColor = 'green' | 'yellow' | 'orange' | 'red';
export type IssueType = 'cut_in' | 'cut_out' | 'sub_optimal' | 'icing';
export type IssueSeverity = 'low' | 'medium' | 'critical';

export interface ImpactIssue {
  type: IssueType;
  severity: IssueSeverity;
  description: string;
  windSpeedMs?: number;
  windGustMs?: number;
  capacityFactor?: number;
  temperatureC?: number;
  humidityPct?: number;
}

export interface OperationalStatus {
  timestamp: string;
  operational: boolean;
  capacityFactor: number;
  status: TurbineStatus;
  color: ImpactColor;
  issues: ImpactIssue[];
}

export interface ImpactEvent {
  type: IssueType;
  severity: IssueSeverity;
  description: string;
  startTime: string;
  endTime: string | null;
  etaHours: number;
  durationHours: number | null;
  status: 'upcoming' | 'current';
}

export interface OverallStatus {
  current: OperationalStatus;
  upcomingEvents: ImpactEvent[];
  priorityColor: ImpactColor;
  priorityIssue: ImpactIssue | null;
}

export const COLOR_RANK: Record<ImpactColor, number> = {
  green: 0,
  yellow: 1,
  orange: 2,
  red: 3,
};

// Marker fills used by map clients.
export const IMPACT_COLOR_HEX: Record<ImpactColor, string> = {
  green: '#27ae60',
  yellow: '#f39c12',
  orange: '#e67e22',
  red: '#e74c3c',
};

/**
 * Cubic power-curve approximation: 0 below cut-in, 1 at or above rated,
 * `((speed - cutIn) / (rated - cutIn))^3` in between.
 */
export const estimateCapacityFactor = (windSpeedMs: number, overrides?: Partial<ImpactThresholds>): number => {
  const { cutInSpeedMs, ratedSpeedMs } = withImpactThresholds(overrides);
  if (windSpeedMs < cutInSpeedMs) {
    return 0;
  }
  if (windSpeedMs >= ratedSpeedMs) {
    return 1;
  }
  const normalized = (windSpeedMs - cutInSpeedMs) / (ratedSpeedMs - cutInSpeedMs);
  return normalized ** 3;
};

/**
 * Classifies a single weather sample into the turbine's operational status.
 *
 * Cut-out (sustained speed or gust) wins over every other wind branch. Icing is
 * checked independently and appended after any wind issue; it lifts the color to
 * orange unless something already ranks at or above it.
 */
export const classifyConditions = (sample: WeatherSample, overrides?: Partial<ImpactThresholds>): OperationalStatus => {
  const { timestamp, windSpeedMs, windGustMs, temperatureC, humidityPct } = assertWeatherSample(sample);
  const thresholds = withImpactThresholds(overrides);

  const result: OperationalStatus = {
    timestamp,
    operational: true,
    capacityFactor: 1,
    status: 'normal',
    color: 'green',
    issues: [],
  };

  if (windGustMs >= thresholds.cutOutSpeedMs || windSpeedMs >= thresholds.cutOutSpeedMs) {
    result.operational = false;
    result.capacityFactor = 0;
    result.status = 'shutdown';
    result.color = 'red';
    result.issues.push({
      type: 'cut_out',
      severity: 'critical',
      description: `High winds: ${windSpeedMs.toFixed(1)} m/s (gusts ${windGustMs.toFixed(1)} m/s) - Emergency shutdown`,
      windSpeedMs,
      windGustMs,
    });
  } else if (windSpeedMs < thresholds.cutInSpeedMs) {
    result.capacityFactor = 0;
    result.status = 'idle';
    result.color = 'yellow';
    result.issues.push({
      type: 'cut_in',
      severity: 'low',
      description: `Low wind: ${windSpeedMs.toFixed(1)} m/s - No generation`,
      windSpeedMs,
    });
  } else if (windSpeedMs < thresholds.ratedSpeedMs) {
    const capacityFactor = estimateCapacityFactor(windSpeedMs, thresholds);
    result.capacityFactor = capacityFactor;
    result.status = 'sub_optimal';
    result.color = 'yellow';
    result.issues.push({
      type: 'sub_optimal',
      severity: 'low',
      description: `Below rated speed: ${windSpeedMs.toFixed(1)} m/s - ${Math.round(capacityFactor * 100)}% capacity`,
      windSpeedMs,
      capacityFactor,
    });
  }

  if (temperatureC <= thresholds.icingTempC && humidityPct >= thresholds.icingHumidityPct) {
    result.issues.push({
      type: 'icing',
      severity: 'medium',
      description: `Icing risk: ${temperatureC.toFixed(1)}°C @ ${Math.round(humidityPct)}% humidity`,
      temperatureC,
      humidityPct,
    });
    if (COLOR_RANK[result.color] < COLOR_RANK.orange) {
      result.color = 'orange';
      result.status = 'icing_risk';
    }
  }

  return result;
};

interface OpenEvent {
  type: IssueType;
  severity: IssueSeverity;
  description: string;
  startTime: string;
  startMs: number;
}

export interface ExtractImpactEventsOptions {
  /** Reference time for ETAs; defaults to the current wall-clock time. */
  now?: TimeInput;
  thresholds?: Partial<ImpactThresholds>;
}

const resolveReferenceMs = (now: TimeInput | undefined): number => {
  if (now === undefined) {
    return Date.now();
  }
  const ms = toEpochMs(now);
  if (ms === null) {
    throw new ContractViolationError('Malformed reference time', 'Expected an ISO-8601 timestamp, epoch milliseconds or Date.');
  }
  return ms;
};

const sampleTimeMs = (timestamp: string): number => {
  const ms = parseIsoTimeToMs(timestamp);
  if (ms === null) {
    throw new ContractViolationError('Malformed weather sample', 'Field "timestamp" must be an ISO-8601 timestamp.');
  }
  return ms;
};

const closeEvent = (open: OpenEvent, nowMs: number, end: { time: string; ms: number } | null): ImpactEvent => {
  const rawEta = hoursBetweenMs(nowMs, open.startMs);
  const etaHours = Math.max(0, rawEta);
  return {
    type: open.type,
    severity: open.severity,
    description: open.description,
    startTime: open.startTime,
    endTime: end ? end.time : null,
    etaHours,
    durationHours: end ? hoursBetweenMs(open.startMs, end.ms) : null,
    status: etaHours > 0 ? 'upcoming' : 'current',
  };
};

/**
 * Merges consecutive impacted forecast hours into events. The event takes its
 * type, severity and description from the first issue of its first hour. An
 * event still open when the forecast runs out has no end time or duration.
 */
export const extractImpactEvents = (forecast: readonly WeatherSample[], options: ExtractImpactEventsOptions = {}): ImpactEvent[] => {
  const nowMs = resolveReferenceMs(options.now);
  const events: ImpactEvent[] = [];
  let open: OpenEvent | null = null;

  for (const hour of forecast) {
    const hourStatus = classifyConditions(hour, options.thresholds);
    const firstIssue = hourStatus.issues.length > 0 ? hourStatus.issues[0] : null;

    if (!open && firstIssue) {
      open = {
        type: firstIssue.type,
        severity: firstIssue.severity,
        description: firstIssue.description,
        startTime: hourStatus.timestamp,
        startMs: sampleTimeMs(hourStatus.timestamp),
      };
    } else if (open && !firstIssue) {
      events.push(closeEvent(open, nowMs, { time: hourStatus.timestamp, ms: sampleTimeMs(hourStatus.timestamp) }));
      open = null;
    }
  }

  if (open) {
    events.push(closeEvent(open, nowMs, null));
  }

  return events;
};

const describeEventAsIssue = (event: ImpactEvent): ImpactIssue => ({
  type: event.type,
  severity: event.severity,
  description: `${event.description} (ETA: ${event.etaHours.toFixed(1)}h)`,
});

/**
 * Combines current conditions with forecast events. The first critical event
 * inside the critical window forces red and ends the scan; medium events inside
 * the medium window raise the color to orange (never over red) and the last one
 * seen before any critical match supplies the priority issue.
 */
export const aggregateOverallStatus = (
  current: OperationalStatus,
  events: readonly ImpactEvent[],
  overrides?: Partial<ImpactThresholds>,
): OverallStatus => {
  const { criticalEscalationHours, mediumEscalationHours } = withImpactThresholds(overrides);
  let priorityColor: ImpactColor = current.color;
  let priorityIssue: ImpactIssue | null = current.issues.length > 0 ? { ...current.issues[0] } : null;

  for (const event of events) {
    if (event.severity === 'critical' && event.etaHours < criticalEscalationHours) {
      priorityColor = 'red';
      priorityIssue = describeEventAsIssue(event);
      break;
    }
    if (event.severity === 'medium' && event.etaHours < mediumEscalationHours && priorityColor !== 'red') {
      priorityColor = 'orange';
      priorityIssue = describeEventAsIssue(event);
    }
  }

  return {
    current,
    upcomingEvents: [...events],
    priorityColor,
    priorityIssue,
  };
};

export interface AnalyzeSiteOptions {
  now?: TimeInput;
  thresholds?: Partial<ImpactThresholds>;
}

export const analyzeSite = (current: WeatherSample, forecast: readonly WeatherSample[], options: AnalyzeSiteOptions = {}): OverallStatus => {
  const currentStatus = classifyConditions(current, options.thresholds);
  const events = extractImpactEvents(forecast, options);
  return aggregateOverallStatus(currentStatus, events, options.thresholds);
};

export interface SummaryLabel {
  name: string;
  capacityMw: number;
}

export const formatImpactSummary = (site: SummaryLabel, overall: OverallStatus): string => {
  const lines = [
    `${site.name} (${site.capacityMw} MW)`,
    `   Status: ${overall.current.status.toUpperCase()}`,
    `   Capacity: ${Math.round(overall.current.capacityFactor * 100)}%`,
  ];

  if (overall.priorityIssue) {
    lines.push(`   Priority: ${overall.priorityIssue.description}`);
  }

  if (overall.upcomingEvents.length > 0) {
    lines.push(`   Events: ${overall.upcomingEvents.length} upcoming event(s)`);
    for (const event of overall.upcomingEvents.slice(0, 3)) {
      if (event.etaHours <= 0) {
        continue;
      }
      const eta = `ETA ${event.etaHours.toFixed(1)}h`;
      lines.push(
        event.durationHours !== null
          ? `      - ${event.type}: ${eta}, duration ${event.durationHours.toFixed(1)}h`
          : `      - ${event.type}: ${eta}`,
      );
    }
  }

  return lines.join('\n');
};
