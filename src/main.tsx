/**
 * 去背景工具 - 页面入口
 * Ant Design 仅 dark 主题
 */
import React, { Component, type ErrorInfo } from 'react';
import ReactDOM from 'react-dom/client';
import { App as AntdApp, ConfigProvider, theme } from 'antd';
import App from './App';
import './index.css';

/** 捕获渲染错误，避免白屏无提示 */
class ErrorBoundary extends Component<{ children: React.ReactNode }, { error: Error | null }> {
  state: { error: Error | null } = { error: null };

  static getDerivedStateFromError(error: Error) {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('[ErrorBoundary]', error, info.componentStack);
  }

  render() {
    if (this.state.error) {
      return (
        <div style={{ padding: 24, color: '#fff', fontFamily: 'monospace', whiteSpace: 'pre-wrap' }}>
          <h2>Something went wrong</h2>
          <pre>{this.state.error.message}</pre>
        </div>
      );
    }
    return this.props.children;
  }
}

const customTheme = {
  components: {
    Progress: {
      defaultColor: 'rgb(156,204,255)',
    },
    Collapse: {
      colorBorder: 'rgba(131,131,131,0.15)',
    },
    Upload: {
      colorBorder: 'rgba(131,131,131,0.35)',
    },
  },
  token: {
    colorInfo: '#f1f7ff',
  },
};

const root = document.getElementById('root');
if (!root) {
  document.body.innerHTML = '<div style="padding:24px;color:red">#root not found</div>';
} else {
  ReactDOM.createRoot(root).render(
    <React.StrictMode>
      <ErrorBoundary>
        <ConfigProvider
          theme={{
            algorithm: theme.darkAlgorithm,
            ...customTheme,
          }}
        >
          <AntdApp>
            <App />
          </AntdApp>
        </ConfigProvider>
      </ErrorBoundary>
    </React.StrictMode>
  );
}
