import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import { NotifierProvider } from './notifications/NotifierProvider';
import './styles.css';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element');
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <NotifierProvider>
      <App pathname={window.location.pathname} />
    </NotifierProvider>
  </React.StrictMode>,
);
