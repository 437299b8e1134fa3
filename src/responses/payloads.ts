export type RootPayload = {
  readonly hello: "world";
  readonly docs: string;
};

export type ApiRootPayload = {
  readonly ok: true;
  readonly msg: string;
};

export type HealthPayload = {
  readonly status: "healthy";
};

/** Path of the interactive API viewer advertised by the root payload. */
export const DOCS_PATH = "/docs";

export const ROOT_PAYLOAD: RootPayload = Object.freeze({
  hello: "world",
  docs: DOCS_PATH,
});

export const API_ROOT_PAYLOAD: ApiRootPayload = Object.freeze({
  ok: true,
  msg: "FastAPI running on Vercel",
});

export const HEALTH_PAYLOAD: HealthPayload = Object.freeze({
  status: "healthy",
});
