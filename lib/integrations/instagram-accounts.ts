import { z } from "zod";
import type { AccountResolver, ConnectOptions, ResolutionOutcome } from "../adapters/base.ts";
import type { ResolutionFailureReason } from "../errors.ts";
import type { Logger } from "../logging/logger.ts";
import { redactBody } from "../logging/redaction.ts";
import type { DiagnosticEntry } from "../types.ts";
import type { MetaGraphClient } from "./meta-graph.ts";

const pageListSchema = z.object({
  data: z
    .array(
      z.object({
        id: z.string(),
        name: z.string().optional(),
        access_token: z.string().optional()
      })
    )
    .default([])
});

const pageDetailSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  instagram_business_account: z
    .object({
      id: z.string(),
      username: z.string().optional()
    })
    .optional()
});

/**
 * Walks user → Facebook Page → linked Instagram Business account. Each request
 * lands in the diagnostic trail so an operator can see which link is missing.
 */
export class InstagramAccountResolver implements AccountResolver {
  private readonly graph: MetaGraphClient;
  private readonly logger: Logger;

  constructor(deps: { graph: MetaGraphClient; logger: Logger }) {
    this.graph = deps.graph;
    this.logger = deps.logger;
  }

  async resolve(accessToken: string, options: ConnectOptions = {}): Promise<ResolutionOutcome> {
    const trail: DiagnosticEntry[] = [];
    const fail = (reason: ResolutionFailureReason, message: string): ResolutionOutcome => ({
      ok: false,
      error: { code: "RESOLUTION_ERROR", reason, message, trail },
      trail
    });

    const listRequest = "GET /me/accounts?fields=id,name,access_token";
    const pages = await this.graph.get(
      "/me/accounts",
      { fields: "id,name,access_token", access_token: accessToken },
      pageListSchema
    );

    if (!pages.ok) {
      trail.push({ step: "list_pages", request: listRequest, status: pages.status, summary: redactBody(pages.rawBody) });
      this.logger.error("Failed to list Facebook pages", { status: pages.status, body: redactBody(pages.rawBody) });
      return fail("request_failed", `Failed to list Facebook pages: ${pages.message}`);
    }

    trail.push({
      step: "list_pages",
      request: listRequest,
      status: pages.status,
      summary: `Pages found: ${pages.data.data.length}`
    });

    if (pages.data.data.length === 0) {
      trail.push({
        step: "select_page",
        request: "(none)",
        status: null,
        summary: "No Facebook pages returned. The login may not have granted page access."
      });
      this.logger.warn("No Facebook pages found for this login");
      return fail("no_accounts", "No Facebook pages were found for this account. Connect a business page linked to Instagram.");
    }

    const page = options.pageId
      ? pages.data.data.find((candidate) => candidate.id === options.pageId)
      : pages.data.data[0];

    if (!page) {
      trail.push({
        step: "select_page",
        request: "(none)",
        status: null,
        summary: `Page ${options.pageId} is not among the pages this login manages.`
      });
      this.logger.warn("Requested Facebook page is not manageable", { pageId: options.pageId });
      return fail("page_not_found", `Facebook page ${options.pageId} is not manageable by this account.`);
    }

    const pageName = page.name ?? page.id;
    trail.push({ step: "select_page", request: "(none)", status: null, summary: `Using page: ${pageName} (ID: ${page.id})` });
    this.logger.info("Found Facebook page", { pageId: page.id, pageName });

    const detailRequest = `GET /${page.id}?fields=instagram_business_account{id,username}`;
    const detail = await this.graph.get(
      `/${page.id}`,
      {
        fields: "instagram_business_account{id,username}",
        access_token: page.access_token ?? accessToken
      },
      pageDetailSchema
    );

    if (!detail.ok) {
      trail.push({ step: "page_link", request: detailRequest, status: detail.status, summary: redactBody(detail.rawBody) });
      this.logger.error("Failed to read Instagram link for page", { pageId: page.id, status: detail.status });
      return fail("request_failed", `Failed to read page ${page.id}: ${detail.message}`);
    }

    const linked = detail.data.instagram_business_account;
    if (!linked) {
      trail.push({
        step: "page_link",
        request: detailRequest,
        status: detail.status,
        summary:
          "No instagram_business_account on this page. The Instagram account may not be linked to the Page, " +
          "or may not be a Business/Creator account."
      });
      this.logger.warn("No Instagram Business account linked to page", { pageId: page.id });
      return fail("not_linked", `Page ${pageName} has no linked Instagram Business account.`);
    }

    trail.push({
      step: "page_link",
      request: detailRequest,
      status: detail.status,
      summary: `Instagram account ID: ${linked.id}`
    });
    this.logger.info("Found Instagram Business account", { accountId: linked.id });

    return {
      ok: true,
      account: { accountId: linked.id, accountName: linked.username ?? pageName, pageId: page.id },
      trail
    };
  }
}
