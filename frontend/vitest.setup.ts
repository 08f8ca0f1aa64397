import '@testing-library/jest-dom/vitest';

// jsdom only logs "not implemented" for alert; fail loudly if a test forgets a notifier.
window.alert = (message?: unknown) => {
  throw new Error(`Unexpected window.alert: ${String(message)}`);
};
