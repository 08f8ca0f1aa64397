import PageShell, { navItems } from '../components/layout/PageShell';
import LineIcon from '../components/icons/LineIcon';

const Home = () => {
  const consoles = navItems.filter((item) => item.key !== 'home');

  return (
    <PageShell active="home" title="Smart meter simulator" subtitle="Operator and customer consoles for the simulated metering backend.">
      <ul className="console-list">
        {consoles.map((item) => (
          <li key={item.key} className="card">
            <a href={item.href}>
              <LineIcon name={item.icon} size={18} /> {item.label}
            </a>
          </li>
        ))}
      </ul>
      <p className="subtle">
        <a href="/reset" className="pill danger">
          <LineIcon name="power" size={16} /> Reset simulation
        </a>{' '}
        clears every registered meter and reading and rewinds the clock.
      </p>
    </PageShell>
  );
};

export default Home;
