/**
 * 失败结果 → 页面提示
 * 校验与解码错误原样展示，其余统一为通用文案，细节只留在服务日志
 */
import { GENERIC_ERROR_MESSAGE, PROCESSING_FAILED_STATUS } from '../../service/constants';
import { RemovalErrorCode } from '../../service/types';

export interface FailureFeedback {
  /** 主区域 */
  error: string;
  /** 侧栏 */
  sidebarError: string;
}

const USER_FACING_CODES: readonly string[] = [RemovalErrorCode.VALIDATION_FAILED, RemovalErrorCode.DECODE_FAILED];

export function failureFeedback(code: string | undefined, message: string): FailureFeedback {
  const shown = code !== undefined && USER_FACING_CODES.includes(code);
  return {
    error: shown ? message : GENERIC_ERROR_MESSAGE,
    sidebarError: PROCESSING_FAILED_STATUS,
  };
}
