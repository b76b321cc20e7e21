export type SinkKind = "jsonl" | "mongo";

export type Env = {
  CRAWL_DATA_DIR: string;
  CRAWL_SINK: SinkKind;
  MONGO_URI: string;
  JUMBO_BASE_URL: string;
  AH_BASE_URL: string;
  AH_AUTH_URL: string;
  ALDI_BASE_URL: string;
  PLUS_BASE_URL: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const readUrl = (env: NodeJS.ProcessEnv, name: string, fallback: string): string => {
  const raw = env[name];
  return validateHttpUrl(name, raw == null || raw.trim() === "" ? fallback : raw.trim());
};

const parseSinkKind = (raw: string | undefined): SinkKind => {
  const value = raw?.trim().toLowerCase() ?? "";
  if (value === "" || value === "jsonl") return "jsonl";
  if (value === "mongo") return "mongo";
  throw new Error(`CRAWL_SINK must be "jsonl" or "mongo". Received: ${String(raw)}`);
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const dataDir = env.CRAWL_DATA_DIR?.trim();

  return {
    CRAWL_DATA_DIR: dataDir ? dataDir : "data",
    CRAWL_SINK: parseSinkKind(env.CRAWL_SINK),
    MONGO_URI: env.MONGO_URI ?? "mongodb://localhost:27017/catalog",
    JUMBO_BASE_URL: readUrl(env, "JUMBO_BASE_URL", "https://mobileapi.jumbo.com/v17"),
    AH_BASE_URL: readUrl(env, "AH_BASE_URL", "https://api.ah.nl/mobile-services"),
    AH_AUTH_URL: readUrl(env, "AH_AUTH_URL", "https://api.ah.nl/mobile-auth/v1/auth/token/anonymous"),
    ALDI_BASE_URL: readUrl(env, "ALDI_BASE_URL", "https://webservice.aldi.nl/api/v1"),
    PLUS_BASE_URL: readUrl(env, "PLUS_BASE_URL", "https://www.plus.nl")
  };
};
