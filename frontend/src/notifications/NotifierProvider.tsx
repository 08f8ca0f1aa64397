import React, { createContext, useContext } from 'react';

export interface Notifier {
  /** Blocking notice the user has to dismiss. */
  alert: (message: string) => void;
}

export const browserNotifier: Notifier = {
  alert: (message) => window.alert(message),
};

const NotifierContext = createContext<Notifier>(browserNotifier);

export const NotifierProvider: React.FC<{ notifier?: Notifier; children: React.ReactNode }> = ({
  notifier = browserNotifier,
  children,
}) => {
  return <NotifierContext.Provider value={notifier}>{children}</NotifierContext.Provider>;
};

export function useNotifier(): Notifier {
  return useContext(NotifierContext);
}
