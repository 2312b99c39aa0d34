import type { BlockAttributes } from "@formblocks/shared-types";

export class FormConfigurationError extends Error {
  constructor(message = "Form is not configured properly.") {
    super(message);
    this.name = "FormConfigurationError";
  }
}

export type PageUrlResolver = (pageId: number) => Promise<string | null>;

export async function getSuccessUrl(
  form: Pick<BlockAttributes, "redirectType" | "pageId" | "url">,
  resolvePage: PageUrlResolver
): Promise<string> {
  if (form.redirectType === "page" && form.pageId !== null && form.pageId !== undefined) {
    const url = await resolvePage(form.pageId);
    if (url) return url;
  } else if (form.redirectType === "url" && form.url) {
    return form.url;
  }
  throw new FormConfigurationError();
}
