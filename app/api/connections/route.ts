import { getAdapter } from "@/lib/adapters";
import { fail, ok } from "@/lib/api/http";
import { checkAdminApiKey } from "@/lib/auth/admin-key";
import { describeCredential } from "@/lib/credentials/credential";
import { CredentialStoreError } from "@/lib/credentials/supabase-store";
import { describeUnknownError } from "@/lib/errors";
import { createPipelineRuntime } from "@/lib/runtime";
import { PLATFORMS } from "@/lib/types";

export async function GET(req: Request) {
  const access = checkAdminApiKey(req);

  if (!access.allowed) {
    return fail(access.error.code, access.error.message, access.error.status);
  }

  try {
    const runtime = createPipelineRuntime();

    const items = await Promise.all(
      PLATFORMS.map(async (platform) => {
        const adapter = getAdapter(runtime.registry, platform);
        const credential = await runtime.store.load(platform);

        return {
          platform,
          configured: adapter.isConfigured(),
          ...describeCredential(credential)
        };
      })
    );

    return ok({ items });
  } catch (error) {
    if (error instanceof CredentialStoreError) {
      return fail(error.code, error.message, error.status);
    }

    return fail("CONNECTIONS_READ_FAILED", describeUnknownError(error), 500);
  }
}
