/** Accepted photo extensions and the MIME type each one implies */
export const PHOTO_CONTENT_TYPES: Readonly<Record<string, string>> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
};

export const PHOTO_EXTENSIONS: readonly string[] = Object.keys(PHOTO_CONTENT_TYPES);
