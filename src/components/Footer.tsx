import { ENGINE_VERSION, RUBRIC_VERSION } from '../contracts/versions';

type InfoPage = 'methodology';

export default function Footer({ onNavigate }: { onNavigate: (page: InfoPage) => void }) {
  return (
    <footer className="site-footer">
      <nav className="footer-links">
        <button className="footer-link" onClick={() => onNavigate('methodology')}>Methodology</button>
      </nav>
      <p className="footer-meta">
        Engine v{ENGINE_VERSION} &nbsp;·&nbsp; Rubric {RUBRIC_VERSION}
      </p>
    </footer>
  );
}
