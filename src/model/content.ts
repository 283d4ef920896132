import { z } from "zod";
import { decodeWith, unrepresentable } from "../codec.js";
import type { WirePath } from "../errors.js";
import type { JsonObject, JsonValue } from "../json.js";

export interface ImageUrl {
  url: string;
}

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "image_url"; imageUrl: ImageUrl };

/**
 * Message body: either plain text or an ordered list of typed blocks.
 * On the wire this is a JSON string or a JSON array, never an object.
 */
export type Content =
  | { kind: "plain_text"; text: string }
  | { kind: "structured"; blocks: ContentBlock[] };

export function plainText(text: string): Content {
  return { kind: "plain_text", text };
}

export function structured(blocks: ContentBlock[]): Content {
  return { kind: "structured", blocks };
}

export function textBlock(text: string): ContentBlock {
  return { type: "text", text };
}

export function imageBlock(url: string): ContentBlock {
  return { type: "image_url", imageUrl: { url } };
}

export const ContentBlockSchema = z
  .discriminatedUnion("type", [
    z.object({ type: z.literal("text"), text: z.string() }),
    z.object({
      type: z.literal("image_url"),
      image_url: z.object({ url: z.string() }),
    }),
  ])
  .transform((block): ContentBlock =>
    block.type === "text"
      ? textBlock(block.text)
      : imageBlock(block.image_url.url),
  );

export const ContentSchema = z.union([
  z.string().transform(plainText),
  z.array(ContentBlockSchema).transform(structured),
]);

export function decodeContent(value: unknown, path: WirePath = []): Content {
  return decodeWith(ContentSchema, value, path);
}

function encodeContentBlock(block: ContentBlock, path: WirePath): JsonObject {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "image_url":
      return { type: "image_url", image_url: { url: block.imageUrl.url } };
    default:
      return unrepresentable(block, path, '"text" | "image_url" block');
  }
}

export function encodeContent(content: Content, path: WirePath = []): JsonValue {
  switch (content.kind) {
    case "plain_text":
      return content.text;
    case "structured":
      return content.blocks.map((block, i) =>
        encodeContentBlock(block, [...path, i]),
      );
    default:
      return unrepresentable(content, path, "plain text or structured content");
  }
}

