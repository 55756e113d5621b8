import React from 'react';
import { createRoot } from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import App from './App';
import { TrialProvider } from './hooks/useTrial';
import './styles.css';

const root = document.getElementById('root');
if (!root) throw new Error('missing #root element');

createRoot(root).render(
  <React.StrictMode>
    <BrowserRouter>
      <TrialProvider>
        <App />
      </TrialProvider>
    </BrowserRouter>
  </React.StrictMode>
);
