import React from 'react';
import LineIcon, { type LineIconName } from '../icons/LineIcon';

export type PageKey = 'home' | 'collect' | 'query' | 'register';

interface NavItem {
  key: PageKey;
  label: string;
  href: string;
  icon: LineIconName;
}

// Plain anchors: every console is its own page load.
export const navItems: NavItem[] = [
  { key: 'home', label: 'Home', href: '/', icon: 'home' },
  { key: 'collect', label: 'Collect readings', href: '/collect', icon: 'clock' },
  { key: 'query', label: 'Usage query', href: '/query', icon: 'chart' },
  { key: 'register', label: 'Register meter', href: '/register', icon: 'plus' },
];

interface Props {
  active: PageKey;
  title: string;
  subtitle?: string;
  children: React.ReactNode;
}

const PageShell: React.FC<Props> = ({ active, title, subtitle, children }) => {
  return (
    <div className="layout-shell">
      <nav className="topnav" aria-label="Consoles">
        <span className="brand">
          <LineIcon name="meter" size={22} /> Smart Meter Simulator
        </span>
        <ul>
          {navItems.map((item) => (
            <li key={item.key}>
              <a
                href={item.href}
                className={item.key === active ? 'nav-link active' : 'nav-link'}
                aria-current={item.key === active ? 'page' : undefined}
              >
                <LineIcon name={item.icon} size={16} /> {item.label}
              </a>
            </li>
          ))}
        </ul>
      </nav>
      <main className="content">
        <header className="page-head">
          <h1>{title}</h1>
          {subtitle && <p className="subtle">{subtitle}</p>}
        </header>
        {children}
      </main>
    </div>
  );
};

export default PageShell;
