/**
 * 原图与去背景结果左右对比
 */
import { Alert, Card, Col, Row, Spin, Typography } from 'antd';
import type { ResultEvent } from '../../../service/protocol';
import { checkerboardBackground } from '@/styles/checkerboardBackground';

const { Text } = Typography;

export interface ComparisonViewProps {
  originalUrl: string | null;
  resultUrl: string | null;
  result: ResultEvent | null;
  processing: boolean;
  error: string | null;
}

const PREVIEW_STYLE = {
  ...checkerboardBackground(),
  display: 'flex',
  alignItems: 'center',
  justifyContent: 'center',
  minHeight: 320,
  borderRadius: 6,
  overflow: 'hidden',
} as const;

function Preview({ src, alt }: { src: string; alt: string }) {
  return <img src={src} alt={alt} style={{ maxWidth: '100%', maxHeight: '70vh', display: 'block' }} />;
}

export function ComparisonView({ originalUrl, resultUrl, result, processing, error }: ComparisonViewProps) {
  if (!originalUrl && !error) {
    return <Alert type="info" showIcon message="Upload an image from the sidebar to begin." />;
  }

  return (
    <>
      {error && <Alert type="error" showIcon message={error} style={{ marginBottom: 16 }} />}
      {originalUrl && (
        <Row gutter={16}>
          <Col xs={24} md={12}>
            <Card title="Original Image" size="small">
              <div style={PREVIEW_STYLE}>
                <Preview src={originalUrl} alt="Original" />
              </div>
              {result && (
                <Text type="secondary">
                  {result.originalWidth} × {result.originalHeight}
                </Text>
              )}
            </Card>
          </Col>
          <Col xs={24} md={12}>
            <Card title="Background Removed" size="small">
              <div style={PREVIEW_STYLE}>
                {resultUrl ? <Preview src={resultUrl} alt="Background removed" /> : processing ? <Spin /> : null}
              </div>
              {result && (
                <Text type="secondary">
                  {result.width} × {result.height}
                  {result.fromCache ? ' · cached' : ''}
                </Text>
              )}
            </Card>
          </Col>
        </Row>
      )}
    </>
  );
}
