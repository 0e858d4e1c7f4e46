export type Platform = "instagram" | "linkedin";

export const PLATFORMS: readonly Platform[] = ["instagram", "linkedin"];

export type Credential = {
  platform: Platform;
  accessToken: string;
  refreshToken?: string | null;
  expiresAt?: string | null;
  accountId?: string | null;
  accountName?: string | null;
  scopes?: string[];
};

export type AuthorizationRequest = {
  platform: Platform;
  state: string;
  createdAt: string;
  expiresAt: string;
};

export type ContainerStatus = "CREATED" | "PROCESSING" | "READY" | "FAILED";

export type MediaContainer = {
  id: string;
  status: ContainerStatus;
  parentId: string | null;
};

export type RenderTemplate = "caption" | "quote" | "code";

export type RenderRequest = {
  template: RenderTemplate;
  text: string;
  title?: string;
  language?: string;
};

export type ContentDescriptor =
  | { kind: "url"; url: string }
  | { kind: "render"; request: RenderRequest };

export type PublishMode = "single" | "carousel";

export type PublishJob = {
  caption: string;
  hashtags?: string[];
  linkUrl?: string | null;
  mode: PublishMode;
  content: ContentDescriptor[];
};

/** A job whose descriptors have been materialized into public media URLs. */
export type ResolvedPublishJob = {
  caption: string;
  hashtags: string[];
  linkUrl: string | null;
  mode: PublishMode;
  mediaUrls: string[];
};

export type DiagnosticEntry = {
  step: string;
  request: string;
  status: number | null;
  summary: string;
};
