import type { InstagramSettings, LinkedInSettings } from "../../lib/config/settings.ts";

export const instagramSettings: InstagramSettings = {
  clientId: "test-app-id",
  clientSecret: "test-secret",
  redirectUri: "https://app.example.test/api/connections/instagram/oauth/callback",
  graphVersion: "v22.0"
};

export const linkedinSettings: LinkedInSettings = {
  clientId: "test-client-id",
  clientSecret: "test-secret",
  redirectUri: "https://app.example.test/api/connections/linkedin/oauth/callback"
};
