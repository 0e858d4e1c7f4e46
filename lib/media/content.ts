import { describeUnknownError, type Result } from "../errors.ts";
import type { Logger } from "../logging/logger.ts";
import type { ContentDescriptor, RenderRequest } from "../types.ts";

/**
 * External card renderer. Implementations must return a URL the platforms can
 * fetch anonymously; the pipeline never handles image bytes.
 */
export interface ImageRenderer {
  render(request: RenderRequest): Promise<string>;
}

/** Points the platform at a renderer service that draws the card on request. */
export class UrlTemplateRenderer implements ImageRenderer {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async render(request: RenderRequest) {
    const query = new URLSearchParams({ text: request.text });
    if (request.title) query.set("title", request.title);
    if (request.language) query.set("language", request.language);
    return `${this.baseUrl}/${request.template}.png?${query.toString()}`;
  }
}

export async function materializeContent(
  content: ContentDescriptor[],
  renderer: ImageRenderer | null,
  logger: Logger
): Promise<Result<string[]>> {
  const urls: string[] = [];

  for (const [index, item] of content.entries()) {
    if (item.kind === "url") {
      urls.push(item.url);
      continue;
    }

    if (!renderer) {
      logger.error("Render requested but no image renderer is configured", { itemIndex: index });
      return {
        ok: false,
        error: { code: "RENDER_ERROR", itemIndex: index, message: "No image renderer is configured." }
      };
    }

    try {
      const url = await renderer.render(item.request);
      if (!/^https?:\/\//i.test(url)) {
        return {
          ok: false,
          error: { code: "RENDER_ERROR", itemIndex: index, message: `Renderer returned a non-public URL for item ${index + 1}.` }
        };
      }
      urls.push(url);
    } catch (error) {
      logger.error("Image rendering failed", { itemIndex: index, message: describeUnknownError(error) });
      return {
        ok: false,
        error: {
          code: "RENDER_ERROR",
          itemIndex: index,
          message: `Failed to render item ${index + 1}: ${describeUnknownError(error)}`
        }
      };
    }
  }

  return { ok: true, value: urls };
}
