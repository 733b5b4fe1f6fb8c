export const SUPPORTED_UPLOAD_ACCEPT = ".txt,.pdf";

export const UNSUPPORTED_UPLOAD_MESSAGE =
  "Please upload a text file (.txt) or PDF document (.pdf)";

export function isSupportedUpload(filename: string): boolean {
  return /\.(txt|pdf)$/i.test(filename);
}
