import type { PageKey } from './components/layout/PageShell';
import CollectionConsole from './pages/CollectionConsole';
import Home from './pages/Home';
import RegisterConsole from './pages/RegisterConsole';
import UsageQueryConsole from './pages/UsageQueryConsole';

export function resolvePage(pathname: string): PageKey {
  const normalized = pathname.replace(/\/+$/, '') || '/';
  switch (normalized) {
    case '/collect':
      return 'collect';
    case '/query':
      return 'query';
    case '/register':
      return 'register';
    default:
      return 'home';
  }
}

const App = ({ pathname }: { pathname: string }) => {
  switch (resolvePage(pathname)) {
    case 'collect':
      return <CollectionConsole />;
    case 'query':
      return <UsageQueryConsole />;
    case 'register':
      return <RegisterConsole />;
    default:
      return <Home />;
  }
};

export default App;
