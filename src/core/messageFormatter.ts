import type { MessageConfig } from "../config/defaults";
import type { DisplayMessage, MessageType } from "../types/display";
import type { QuakeEvent } from "../types/quake";
import { nowDisplayString } from "../utils/timezone";
import { createDisplayMessage } from "./messageIdentity";

export type ColorConfig = Pick<
  MessageConfig,
  "warningColor" | "reportColor" | "customTextColor" | "defaultColor" | "weatherColor"
>;

const DEFAULT_WARNING_ORGS: Record<string, string> = {
  cea: "中国地震预警网",
  "cea-pr": "省级地震局",
  sichuan: "四川地震局",
  "cwa-eew": "台湾中央气象局",
  jma: "日本气象厅",
  sa: "美国ShakeAlert",
  "kma-eew": "韩国气象厅",
  nied: "日本防災科研所预警"
};

const CENC_ORGANIZATION = "中国地震台网中心自动测定/正式测定";

const WEATHER_LEVEL_COLORS: Record<string, string> = {
  红色: "#FF0000",
  橙色: "#FF8C00",
  黄色: "#FFFF00",
  蓝色: "#00BFFF",
  白色: "#FFFFFF"
};

export const HEADLINE_LEVEL_PATTERN = /发布(.+?)(红色|橙色|黄色|蓝色|白色)预警/;
export const DESCRIPTION_LEVEL_PATTERN = /([^，。：:；;]+?)(红色|橙色|黄色|蓝色|白色)预警/;

function warningHeader(event: QuakeEvent): string {
  const { source, organization, extra } = event;
  if (source === "jma") {
    return extra.infoType ? `【日本气象厅 紧急地震速报 ${extra.infoType}】` : "【日本气象厅 紧急地震速报】";
  }
  if (source === "cea-pr" && extra.province) return `【${extra.province}地震局地震预警】`;
  if (organization) {
    if (organization.includes("地震预警") || organization.includes("地震情报")) return `【${organization}】`;
    if (organization.endsWith("地震预警网")) return `【${organization}预警】`;
    if (organization.endsWith("预警")) return `【${organization}】`;
    return `【${organization}预警】`;
  }
  let fallback = DEFAULT_WARNING_ORGS[source] ?? "地震预警";
  if (fallback === "地震预警" && source.startsWith("wolfx_")) fallback = "Wolfx 预警";
  return fallback.endsWith("预警") ? `【${fallback}】` : `【${fallback}预警】`;
}

function describeQuake(place: string, magnitude: number): string {
  if (place && magnitude > 0) return `${place}发生${magnitude.toFixed(1)}级地震`;
  if (place) return `${place}发生地震`;
  if (magnitude > 0) return `发生${magnitude.toFixed(1)}级地震`;
  return "";
}

export function formatWarning(event: QuakeEvent): string {
  const parts = [warningHeader(event)];

  let updates = event.extra.updates !== undefined && event.extra.updates > 0 ? Math.trunc(event.extra.updates) : 0;
  if (updates === 0 && event.source === "sa") updates = 1;
  if (updates > 0) {
    parts.push(event.source === "jma" && event.extra.final ? "最终报" : `第${updates}报`);
  }

  if (event.shockTime) parts.push(`，${event.shockTime}，`);
  parts.push(describeQuake(event.placeName, event.magnitude) || "发生地震");

  const depth = event.depth > 0 ? event.depth : 10;
  parts.push(`，震源深度${Math.round(depth)}公里`);

  const intensity = event.extra.epiIntensity ?? 0;
  if (intensity > 0) parts.push(`，预估最大烈度${intensity.toFixed(1)}度`);

  return parts.join("");
}

function reportHeader(event: QuakeEvent): string {
  const organization = event.organization;
  if (!organization) return "【地震信息】";
  if (organization === "FSSN") return "【FSSN地震信息】";
  if (organization === CENC_ORGANIZATION) {
    const infoType = (event.extra.infoType ?? "").replace(/^\[+|\]+$/g, "");
    let determination = "自动测定/正式测定";
    if (infoType.includes("正式测定")) determination = "正式测定";
    else if (infoType.includes("自动测定")) determination = "自动测定";
    return `【中国地震台网中心${determination}】`;
  }
  if (organization.includes("地震信息") || organization.includes("地震情报") || organization.includes("海啸")) {
    return `【${organization}】`;
  }
  return `【${organization}地震信息】`;
}

export function formatReport(event: QuakeEvent, zone: string, now: number = Date.now()): string {
  const parts = [reportHeader(event), event.shockTime || nowDisplayString(zone, now)];

  if (event.extra.isTsunami) {
    if (event.placeName) parts.push(`，${event.placeName}`);
    return parts.join("");
  }

  const quake = describeQuake(event.placeName, event.magnitude);
  if (quake) parts.push(`，${quake}`);
  parts.push(`，震源深度${Math.round(event.depth)}公里`);
  return parts.join("");
}

export function formatWeather(event: QuakeEvent): string {
  const title = event.extra.title ?? event.extra.headline ?? event.placeName;
  let text = `【气象预警】${title}`;
  if (event.shockTime) text += `。${event.shockTime}`;
  if (event.extra.description) text += `，${event.extra.description}`;
  return text;
}

export function weatherLevelColor(headline: string, description: string, fallback: string): string {
  const level = HEADLINE_LEVEL_PATTERN.exec(headline)?.[2] ?? DESCRIPTION_LEVEL_PATTERN.exec(description)?.[2];
  return (level && WEATHER_LEVEL_COLORS[level]) || fallback;
}

export function messageColor(type: MessageType, colors: ColorConfig, event?: QuakeEvent): string {
  switch (type) {
    case "warning":
      return colors.warningColor;
    case "report":
      return colors.reportColor;
    case "weather":
      return weatherLevelColor(
        event?.extra.headline ?? event?.placeName ?? "",
        event?.extra.description ?? "",
        colors.weatherColor
      );
    case "custom":
      return colors.customTextColor;
    default:
      return colors.defaultColor;
  }
}

export function formatEventText(event: QuakeEvent, zone: string, now: number = Date.now()): string {
  switch (event.type) {
    case "warning":
      return formatWarning(event);
    case "weather":
      return formatWeather(event);
    default:
      return formatReport(event, zone, now);
  }
}

/** Builds the buffered form of an event. Only warnings keep a shock time for expiry checks. */
export function toDisplayMessage(event: QuakeEvent, colors: ColorConfig, zone: string, now: number): DisplayMessage {
  return createDisplayMessage({
    text: formatEventText(event, zone, now),
    color: messageColor(event.type, colors, event),
    source: event.source,
    eventId: event.eventId,
    shockTime: event.type === "warning" ? event.shockTime : undefined,
    messageType: event.type,
    event,
    createdAt: now
  });
}
