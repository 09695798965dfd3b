import { FanStudioAdapter } from "./fanStudio";
import { NiedAdapter } from "./nied";
import { P2PQuakeAdapter } from "./p2pQuake";
import { P2PQuakeTsunamiAdapter } from "./p2pQuakeTsunami";
import type { Adapter, AdapterContext, AdapterFamily } from "./types";
import { WolfxAdapter } from "./wolfx";

export interface FeedRoute {
  family: AdapterFamily;
  /** Connection type taken from the URL, e.g. `all`, `sc_eew`, `cenc_eqlist`. */
  sourceType: string;
}

export interface ResolvedFeed extends FeedRoute {
  adapter: Adapter;
}

export interface ResolveOptions {
  fanStudioSources?: readonly string[];
}

interface RoutePattern {
  matches: (url: URL) => boolean;
  route: (url: URL) => FeedRoute;
}

function lastSegment(url: URL): string {
  return url.pathname.split("/").filter(Boolean).pop() ?? "";
}

function isSocket(url: URL): boolean {
  return url.protocol === "ws:" || url.protocol === "wss:";
}

const ROUTES: readonly RoutePattern[] = [
  {
    matches: (url) => url.hostname.endsWith("fanstudio.tech") || url.hostname.endsWith("fanstudio.hk"),
    route: (url) => ({ family: "fanstudio", sourceType: lastSegment(url) || "all" })
  },
  {
    matches: (url) => url.hostname === "ws-api.wolfx.jp",
    route: (url) => ({ family: "wolfx", sourceType: lastSegment(url) })
  },
  {
    matches: (url) => url.hostname === "api.wolfx.jp" && url.pathname.endsWith(".json"),
    route: (url) => ({ family: "wolfx", sourceType: lastSegment(url).replace(/\.json$/, "") })
  },
  {
    matches: (url) => url.hostname === "sismotide.top" && url.pathname.includes("/nied"),
    route: () => ({ family: "nied", sourceType: "nied" })
  },
  {
    matches: (url) => url.hostname === "api.p2pquake.net",
    route: (url) =>
      url.pathname.includes("tsunami")
        ? { family: "p2pquake_tsunami", sourceType: "p2pquake_tsunami" }
        : { family: "p2pquake", sourceType: "p2pquake" }
  },
  {
    // Unknown socket endpoints are assumed to speak the FanStudio frame format.
    matches: isSocket,
    route: (url) => ({ family: "fanstudio", sourceType: lastSegment(url) || "all" })
  }
];

export function routeFeed(rawUrl: string): FeedRoute | null {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return null;
  }
  const pattern = ROUTES.find((candidate) => candidate.matches(url));
  return pattern ? pattern.route(url) : null;
}

export function createAdapter(route: FeedRoute, ctx: AdapterContext, options: ResolveOptions = {}): Adapter {
  switch (route.family) {
    case "fanstudio":
      return new FanStudioAdapter(ctx, { sourceType: route.sourceType, acceptedSources: options.fanStudioSources });
    case "wolfx":
      return new WolfxAdapter(ctx, route.sourceType);
    case "nied":
      return new NiedAdapter(ctx);
    case "p2pquake":
      return new P2PQuakeAdapter(ctx);
    case "p2pquake_tsunami":
      return new P2PQuakeTsunamiAdapter(ctx);
  }
}

/** Returns null for URLs no adapter understands; the caller skips them. */
export function resolveFeed(rawUrl: string, ctx: AdapterContext, options: ResolveOptions = {}): ResolvedFeed | null {
  const route = routeFeed(rawUrl);
  if (!route) return null;
  return { ...route, adapter: createAdapter(route, ctx, options) };
}
