import path from "node:path";

export interface AttachmentRecord {
  id: string | number;
}

/** What a path token can see of the attachment being interpolated. */
export interface InterpolationTarget {
  readonly name: string;
  readonly record: AttachmentRecord;
  readonly originalFilename: string | null;
  path(style?: string): string;
}

export type Interpolator = (attachment: InterpolationTarget, style: string) => string;

export const DEFAULT_PATH = ":attachment/:id/:style/:basename.:extension";

function extension(filename: string | null): string {
  return filename ? path.extname(filename).replace(/^\./, "") : "";
}

function basename(filename: string | null): string {
  return filename ? path.basename(filename, path.extname(filename)) : "";
}

/**
 * Interpolations maps `:token` names in path templates to functions of the
 * attachment and style. Unknown tokens are left in place.
 */
export class Interpolations {
  private tokens = new Map<string, Interpolator>([
    ["attachment", (a) => a.name],
    ["id", (a) => String(a.record.id)],
    ["style", (_a, style) => style],
    ["filename", (a) => a.originalFilename ?? ""],
    ["basename", (a) => basename(a.originalFilename)],
    ["extension", (a) => extension(a.originalFilename)],
  ]);

  register(token: string, fn: Interpolator): void {
    this.tokens.set(token, fn);
  }

  has(token: string): boolean {
    return this.tokens.has(token);
  }

  interpolate(template: string, attachment: InterpolationTarget, style: string): string {
    return template.replace(/:([a-zA-Z_]+)/g, (match, token: string) => {
      const fn = this.tokens.get(token);
      return fn ? fn(attachment, style) : match;
    });
  }
}
