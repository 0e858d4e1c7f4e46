import { getAdapter } from "@/lib/adapters";
import { fail, ok } from "@/lib/api/http";
import { publishRequestSchema } from "@/lib/api/schemas";
import { parseJsonBody } from "@/lib/api/validation";
import { checkAdminApiKey } from "@/lib/auth/admin-key";
import { CredentialStoreError } from "@/lib/credentials/supabase-store";
import { describeUnknownError } from "@/lib/errors";
import { categorizePublishFailure, failureHttpStatus, publishJob } from "@/lib/publish/service";
import { createPipelineRuntime } from "@/lib/runtime";

export async function POST(req: Request) {
  const access = checkAdminApiKey(req);

  if (!access.allowed) {
    return fail(access.error.code, access.error.message, access.error.status);
  }

  const parsed = await parseJsonBody(req, publishRequestSchema);
  if (!parsed.success) {
    return parsed.response;
  }

  const { platform, job, deadlineSeconds } = parsed.data;

  try {
    const runtime = createPipelineRuntime();
    const credential = await runtime.store.load(platform);

    const result = await publishJob({
      adapter: getAdapter(runtime.registry, platform),
      credential,
      job,
      renderer: runtime.renderer,
      logger: runtime.logger.child("publish"),
      options: {
        deadline: deadlineSeconds ? new Date(Date.now() + deadlineSeconds * 1000) : null
      }
    });

    if (result.success) {
      return ok({
        platform,
        postId: result.postId,
        state: result.state,
        history: result.history
      });
    }

    const failure = categorizePublishFailure(result.error);

    return fail(failure.code, failure.userMessage, failureHttpStatus(result.error), {
      platform,
      category: failure.category,
      retryable: failure.retryable,
      detail: failure.message,
      state: result.state,
      history: result.history
    });
  } catch (error) {
    if (error instanceof CredentialStoreError) {
      return fail(error.code, error.message, error.status);
    }

    return fail("PUBLISH_FAILED", describeUnknownError(error), 500);
  }
}
