import { Collapse } from 'antd';
import { InfoCircleOutlined } from '@ant-design/icons';
import { MAX_FILE_SIZE } from '../../../service/constants';

const TIPS = [
  'Supported: PNG, JPG, JPEG',
  `Max file size: ${Math.round(MAX_FILE_SIZE / (1024 * 1024))}MB`,
  'Large images are automatically resized',
  'Output will be a transparent PNG',
];

export function InfoPanel() {
  return (
    <Collapse
      size="small"
      items={[
        {
          key: 'info',
          label: (
            <span>
              <InfoCircleOutlined /> Info &amp; Tips
            </span>
          ),
          children: (
            <ul style={{ margin: 0, paddingLeft: 18 }}>
              {TIPS.map((tip) => (
                <li key={tip}>{tip}</li>
              ))}
            </ul>
          ),
        },
      ]}
    />
  );
}
