/**
 * 深色棋盘格背景：预览区展示透明通道
 */
import type { CSSProperties } from 'react';

export function checkerboardBackground(cell = 10): CSSProperties {
  return {
    backgroundColor: '#1a1a1a',
    backgroundImage: `
      linear-gradient(45deg, #2a2a2a 25%, transparent 25%),
      linear-gradient(-45deg, #2a2a2a 25%, transparent 25%),
      linear-gradient(45deg, transparent 75%, #2a2a2a 75%),
      linear-gradient(-45deg, transparent 75%, #2a2a2a 75%)
    `,
    backgroundSize: `${cell * 2}px ${cell * 2}px`,
    backgroundPosition: `0 0, 0 ${cell}px, ${cell}px -${cell}px, -${cell}px 0px`,
  };
}
