/**
 * 侧栏：上传、进度、下载与说明
 */
import { Alert, Button, Progress, Space, Typography, Upload } from 'antd';
import { ClearOutlined, DownloadOutlined, InboxOutlined } from '@ant-design/icons';
import { DOWNLOAD_FILE_NAME } from '../../../service/constants';
import { ACCEPT_ATTRIBUTE } from '@/utils/upload';
import type { RemovalProgress } from '@/hooks/useBackgroundRemoval';
import { InfoPanel } from './InfoPanel';

const { Title, Text } = Typography;

export interface UploadSidebarProps {
  processing: boolean;
  progress: RemovalProgress | null;
  resultUrl: string | null;
  sidebarError: string | null;
  /** 已选择过图片（含校验失败的） */
  hasImage: boolean;
  onSelect: (file: File) => void;
  onClear: () => void;
}

export function UploadSidebar({
  processing,
  progress,
  resultUrl,
  sidebarError,
  hasImage,
  onSelect,
  onClear,
}: UploadSidebarProps) {
  return (
    <Space direction="vertical" size="middle" style={{ width: '100%' }}>
      <Title level={4} style={{ margin: 0 }}>
        Upload and Download
      </Title>

      <Upload.Dragger
        accept={ACCEPT_ATTRIBUTE}
        multiple={false}
        showUploadList={false}
        disabled={processing}
        beforeUpload={(file) => {
          onSelect(file);
          // 阻止 antd 自动上传，由 useBackgroundRemoval 负责
          return false;
        }}
      >
        <p className="ant-upload-drag-icon">
          <InboxOutlined />
        </p>
        <p className="ant-upload-text">Upload Image</p>
        <p className="ant-upload-hint">PNG, JPG or JPEG</p>
      </Upload.Dragger>

      {progress && (
        <div>
          <Progress percent={progress.percent} status={sidebarError ? 'exception' : processing ? 'active' : 'normal'} />
          <Text type="secondary">{progress.status}</Text>
        </div>
      )}

      {sidebarError && <Alert type="error" showIcon message={sidebarError} />}

      {resultUrl && (
        <Button type="primary" icon={<DownloadOutlined />} href={resultUrl} download={DOWNLOAD_FILE_NAME} block>
          Download Output (PNG)
        </Button>
      )}

      {hasImage && (
        <Button icon={<ClearOutlined />} onClick={onClear} block>
          Clear
        </Button>
      )}

      <InfoPanel />
    </Space>
  );
}
