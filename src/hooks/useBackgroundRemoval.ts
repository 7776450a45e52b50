/**
 * 单页去背景流程的状态：选择文件 → 本地校验 → 上传处理 → 展示结果
 * 每次选择新文件都会重置上一轮的结果与对象 URL
 */
import { useCallback, useEffect, useRef, useState } from 'react';
import type { ResultEvent } from '../../service/protocol';
import { validateUpload } from '@/utils/upload';
import { removeBackground } from '@/services/removalClient';
import { failureFeedback } from '@/utils/removalFeedback';
import { LatestRun } from '@/utils/latestRun';

export interface RemovalProgress {
  percent: number;
  status: string;
}

export interface RemovalViewState {
  fileName: string | null;
  originalUrl: string | null;
  resultUrl: string | null;
  result: ResultEvent | null;
  progress: RemovalProgress | null;
  /** 页面主区域展示的错误 */
  error: string | null;
  /** 侧栏展示的失败提示 */
  sidebarError: string | null;
  processing: boolean;
}

const INITIAL_STATE: RemovalViewState = {
  fileName: null,
  originalUrl: null,
  resultUrl: null,
  result: null,
  progress: null,
  error: null,
  sidebarError: null,
  processing: false,
};

export function useBackgroundRemoval() {
  const [state, setState] = useState<RemovalViewState>(INITIAL_STATE);
  const urlsRef = useRef<string[]>([]);
  const [runs] = useState(() => new LatestRun());

  const revokeUrls = useCallback(() => {
    for (const url of urlsRef.current) URL.revokeObjectURL(url);
    urlsRef.current = [];
  }, []);

  useEffect(() => revokeUrls, [revokeUrls]);

  const selectFile = useCallback(
    async (file: File) => {
      const run = runs.start();
      revokeUrls();

      const invalid = validateUpload(file);
      if (invalid) {
        setState({ ...INITIAL_STATE, fileName: file.name, error: invalid });
        return;
      }

      const originalUrl = URL.createObjectURL(file);
      urlsRef.current.push(originalUrl);
      setState({
        ...INITIAL_STATE,
        fileName: file.name,
        originalUrl,
        processing: true,
        progress: { percent: 0, status: 'Uploading image...' },
      });

      try {
        const res = await removeBackground(file, file.name, {
          onProgress: ({ percent, status }) => {
            if (!runs.isCurrent(run)) return;
            setState((prev) => ({ ...prev, progress: { percent, status } }));
          },
        });
        if (!runs.isCurrent(run)) return;
        if (res.ok) {
          const resultUrl = URL.createObjectURL(res.png);
          urlsRef.current.push(resultUrl);
          setState((prev) => ({ ...prev, processing: false, resultUrl, result: res.result }));
        } else {
          const feedback = failureFeedback(res.code, res.message);
          setState((prev) => ({
            ...prev,
            ...feedback,
            processing: false,
            progress: prev.progress && { ...prev.progress, status: feedback.sidebarError },
          }));
        }
      } catch (e) {
        console.error('[useBackgroundRemoval] 请求失败:', e);
        if (!runs.isCurrent(run)) return;
        setState((prev) => ({ ...prev, ...failureFeedback(undefined, ''), processing: false }));
      }
    },
    [runs, revokeUrls]
  );

  /** 清空当前图片与结果，进行中的请求结果会被丢弃 */
  const clear = useCallback(() => {
    runs.invalidate();
    revokeUrls();
    setState(INITIAL_STATE);
  }, [runs, revokeUrls]);

  return { state, selectFile, clear };
}
