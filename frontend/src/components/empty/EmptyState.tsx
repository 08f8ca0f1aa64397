import React from 'react';
import LineIcon from '../icons/LineIcon';

interface Props {
  title: string;
  description?: string;
}

const EmptyState: React.FC<Props> = ({ title, description }) => {
  return (
    <div className="empty-state" role="status" aria-live="polite">
      <span className="empty-illustration">
        <LineIcon name="chart" size={40} strokeWidth={1.2} />
      </span>
      <div>
        <h3>{title}</h3>
        {description && <p className="subtle">{description}</p>}
      </div>
    </div>
  );
};

export default EmptyState;
