export function getFileExtension(filename: string): string | null {
  const normalized = filename.trim();
  const dotIndex = normalized.lastIndexOf('.');
  if (dotIndex < 0 || dotIndex === normalized.length - 1) return null;
  return normalized.slice(dotIndex + 1).toLowerCase();
}

export function isSupportedImageFile(filename: string | undefined, supportedFormats: string[]): boolean {
  if (!filename) return false;
  const extension = getFileExtension(filename);
  if (!extension) return false;
  return supportedFormats.some((format) => format.toLowerCase() === extension);
}

export function isImageMimeType(mimeType: string | undefined): boolean {
  return typeof mimeType === 'string' && mimeType.toLowerCase().startsWith('image/');
}

/** Sniffs the container format from magic bytes. */
export function detectImageMimeType(bytes: Uint8Array): string | null {
  const startsWith = (...signature: number[]) =>
    bytes.byteLength >= signature.length && signature.every((value, index) => bytes[index] === value);

  if (startsWith(0xff, 0xd8, 0xff)) return 'image/jpeg';
  if (startsWith(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a)) return 'image/png';
  if (startsWith(0x47, 0x49, 0x46, 0x38)) return 'image/gif';
  if (startsWith(0x42, 0x4d)) return 'image/bmp';
  if (startsWith(0x49, 0x49, 0x2a, 0x00) || startsWith(0x4d, 0x4d, 0x00, 0x2a)) return 'image/tiff';
  if (
    startsWith(0x52, 0x49, 0x46, 0x46) &&
    bytes.byteLength >= 12 &&
    bytes[8] === 0x57 &&
    bytes[9] === 0x45 &&
    bytes[10] === 0x42 &&
    bytes[11] === 0x50
  ) {
    return 'image/webp';
  }
  return null;
}
