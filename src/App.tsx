/**
 * 去背景工具 - 根组件
 * 左侧上传与下载，右侧原图/结果对比
 */
import { Layout, Typography } from 'antd';
import { UploadSidebar } from './components/remover/UploadSidebar';
import { ComparisonView } from './components/remover/ComparisonView';
import { useBackgroundRemoval } from './hooks/useBackgroundRemoval';

const { Sider, Content } = Layout;
const { Title, Paragraph } = Typography;

function App() {
  const { state, selectFile, clear } = useBackgroundRemoval();

  return (
    <Layout style={{ minHeight: '100vh' }}>
      <Sider width={320} theme="light" style={{ padding: 16, background: '#141414' }}>
        <UploadSidebar
          processing={state.processing}
          progress={state.progress}
          resultUrl={state.resultUrl}
          sidebarError={state.sidebarError}
          hasImage={state.fileName !== null}
          onSelect={(file) => void selectFile(file)}
          onClear={clear}
        />
      </Sider>
      <Content style={{ padding: '24px' }}>
        <Title level={2}>Image Background Remover</Title>
        <Paragraph type="secondary">
          Upload an image and we&apos;ll remove the background for you. The result is a transparent PNG you can
          download.
        </Paragraph>
        <ComparisonView
          originalUrl={state.originalUrl}
          resultUrl={state.resultUrl}
          result={state.result}
          processing={state.processing}
          error={state.error}
        />
      </Content>
    </Layout>
  );
}

export default App;
