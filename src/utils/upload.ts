/**
 * 上传前的本地校验，与服务端限制一致
 */
import { ACCEPTED_EXTENSIONS, ACCEPTED_MIME_TYPES, MAX_FILE_SIZE, tooLargeMessage } from '../../service/constants';

export interface UploadCandidate {
  name: string;
  size: number;
  type: string;
}

export const FILE_TOO_LARGE_MESSAGE = tooLargeMessage(MAX_FILE_SIZE);
export const UNSUPPORTED_TYPE_MESSAGE = 'Unsupported file type. Please upload a PNG, JPG or JPEG image.';

/** Upload 组件的 accept 属性 */
export const ACCEPT_ATTRIBUTE = ACCEPTED_EXTENSIONS.map((ext) => `.${ext}`).join(',');

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot >= 0 ? name.slice(dot + 1).toLowerCase() : '';
}

/** 有 MIME 时按 MIME 判断，否则退回扩展名（部分系统拖入文件没有 type） */
export function isAcceptedImage(file: UploadCandidate): boolean {
  if (file.type) return ACCEPTED_MIME_TYPES.some((t) => t === file.type);
  const ext = extensionOf(file.name);
  return ACCEPTED_EXTENSIONS.some((e) => e === ext);
}

/** 返回错误文案；通过时返回 null */
export function validateUpload(file: UploadCandidate, maxFileSize: number = MAX_FILE_SIZE): string | null {
  if (!isAcceptedImage(file)) return UNSUPPORTED_TYPE_MESSAGE;
  if (file.size > maxFileSize) return tooLargeMessage(maxFileSize);
  return null;
}
