/**
 * 去背景服务与页面共用的常量
 */

/** 上传文件大小上限：10 MiB */
export const MAX_FILE_SIZE = 10 * 1024 * 1024;

/** 处理前的最大边长，超出则等比缩小 */
export const MAX_IMAGE_DIMENSION = 2000;

export const ACCEPTED_MIME_TYPES = ['image/png', 'image/jpeg', 'image/jpg'] as const;

export const ACCEPTED_EXTENSIONS = ['png', 'jpg', 'jpeg'] as const;

export const DOWNLOAD_FILE_NAME = 'removed_background.png';

export const DOWNLOAD_MIME_TYPE = 'image/png';

export const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred.';

export const PROCESSING_FAILED_STATUS = 'Processing failed.';

export function tooLargeMessage(maxFileSize: number): string {
  const limit =
    maxFileSize >= 1024 * 1024 ? `${Math.round(maxFileSize / (1024 * 1024))}MB` : `${Math.round(maxFileSize / 1024)}KB`;
  return `File too large. Please upload an image smaller than ${limit}.`;
}
