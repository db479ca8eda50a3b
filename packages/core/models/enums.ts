/**
 * MIME types the bridge knows how to move between clipboard and clients.
 */
export enum MimeType {
  Text = "text/plain",
  Png = "image/png",
  Jpeg = "image/jpeg",
}

export function isImageMime(mimeType: string): boolean {
  return mimeType.startsWith("image/");
}
