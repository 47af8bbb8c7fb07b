import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import { usePuzzleStore } from './store/puzzleStore';
import { configFromEnv } from './utils/config';

usePuzzleStore.getState().configure(configFromEnv(import.meta.env));

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Could not find root element to mount to');
}

const root = ReactDOM.createRoot(rootElement);
root.render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);
