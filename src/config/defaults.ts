export interface MessageConfig {
  warningShockValiditySeconds: number;
  warningMinDisplaySeconds: number;
  noActivityMessage: string;
  customText: string;
  useCustomText: boolean;
  warningColor: string;
  reportColor: string;
  customTextColor: string;
  defaultColor: string;
  weatherColor: string;
}

export interface ArbiterConfig {
  bufferCapacity: number;
  queueCapacity: number;
  batchSize: number;
  tickMs: number;
  identityWindowSeconds: number;
  identityPrefixLength: number;
}

export interface DisplayConfig {
  viewportWidth: number;
  frameMs: number;
  charsPerFrame: number;
  loadingMessage: string;
  loadingColor: string;
}

export interface FeedsConfig {
  websockets: readonly string[];
  http: readonly string[];
  /** Sub-sources accepted from the FanStudio `all` stream. Empty accepts every source. */
  fanStudioSources: readonly string[];
  reconnect: {
    maxAttempts: number;
    stepSeconds: number;
    maxDelaySeconds: number;
  };
  polling: {
    intervalMs: number;
    eqlistIntervalMs: number;
    timeoutMs: number;
    attempts: number;
    retryDelayMs: number;
    errorLogIntervalMs: number;
  };
}

export interface AppConfig {
  timezone: string;
  message: MessageConfig;
  arbiter: ArbiterConfig;
  display: DisplayConfig;
  feeds: FeedsConfig;
  resources: {
    weatherImagesDir: string;
  };
  demo: {
    enabled: boolean;
    intervalMs: number;
  };
  ui: {
    sampleMs: number;
    logBuffer: number;
  };
  metrics: {
    windowSec: number;
    publishMs: number;
  };
  journal: {
    enabled: boolean;
    path: string;
    flushMs: number;
  };
}

const IDLE_TEXT = "系统运行中，等待最新地震信息...";

export const DEFAULTS = {
  timezone: "Asia/Shanghai",
  message: {
    warningShockValiditySeconds: 300,
    warningMinDisplaySeconds: 300,
    noActivityMessage: IDLE_TEXT,
    customText: IDLE_TEXT,
    useCustomText: false,
    warningColor: "#FF0000",
    reportColor: "#00FFFF",
    customTextColor: "#01FF00",
    defaultColor: "#01FF00",
    weatherColor: "#FFF500"
  },
  arbiter: {
    bufferCapacity: 20,
    queueCapacity: 100,
    batchSize: 5,
    tickMs: 100,
    identityWindowSeconds: 30,
    identityPrefixLength: 80
  },
  display: {
    viewportWidth: 96,
    frameMs: 60,
    charsPerFrame: 1,
    loadingMessage: "正在加载数据，请稍后......",
    loadingColor: "#01FF00"
  },
  feeds: {
    websockets: ["wss://ws.fanstudio.tech/all"],
    http: [
      "https://api.p2pquake.net/v2/history?codes=551&limit=3",
      "https://api.p2pquake.net/v2/jma/tsunami?limit=1"
    ],
    fanStudioSources: [],
    reconnect: {
      maxAttempts: -1,
      stepSeconds: 2,
      maxDelaySeconds: 30
    },
    polling: {
      intervalMs: 2000,
      eqlistIntervalMs: 5000,
      timeoutMs: 10_000,
      attempts: 3,
      retryDelayMs: 2000,
      errorLogIntervalMs: 60_000
    }
  },
  resources: {
    weatherImagesDir: "assets/weather-signals"
  },
  demo: {
    enabled: false,
    intervalMs: 8000
  },
  ui: {
    sampleMs: 100,
    logBuffer: 250
  },
  metrics: {
    windowSec: 30,
    publishMs: 1000
  },
  journal: {
    enabled: true,
    path: "data/events.ndjson",
    flushMs: 1000
  }
} as const satisfies AppConfig;
