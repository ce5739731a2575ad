import React from 'react';
import { createRoot } from 'react-dom/client';
import './index.css';
import { parsePageSelection } from './config';
import DashboardPage from './DashboardPage';
import { logger } from './lib/logger';

const container = document.getElementById('root');
if (container) {
  createRoot(container).render(
    <React.StrictMode>
      <DashboardPage selection={parsePageSelection(window.location.search)} />
    </React.StrictMode>
  );
} else {
  logger.error('missing #root element, dashboard not mounted');
}
