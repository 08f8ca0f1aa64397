import React from 'react';

interface ErrorNoticeProps {
  message: string;
}

/** Inline error text shared by every console. */
const ErrorNotice: React.FC<ErrorNoticeProps> = ({ message }) => {
  return (
    <div className="error-notice" role="alert" aria-live="assertive">
      <p className="error-text">{message}</p>
    </div>
  );
};

export default ErrorNotice;
