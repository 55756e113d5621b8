import React from 'react';
import { Link } from 'react-router-dom';
import SettingsPanel from '../components/SettingsPanel';
import StatusLine from '../components/StatusLine';
import Controls from '../components/Controls';
import BoxGrid from '../components/BoxGrid';
import SessionDetails from '../components/SessionDetails';
import { useTrial } from '../hooks/useTrial';
import { useElapsed } from '../hooks/useElapsed';
import { downloadSessionZip } from '../utils/zip';

export default function Task() {
  const { view, timing, record, revealing, settings, events, upload, updateSettings, newGame, openNext, stop } = useTrial();
  const elapsedSec = useElapsed(timing.startedAt, timing.revealedAt);

  async function onDownload() {
    await downloadSessionZip({
      record,
      config: { boxCount: view.boxCount, gridColumns: view.gridColumns, payoffPerBox: view.payoffPerBox },
      events,
    });
  }

  return (
    <div className="layout">
      <SettingsPanel settings={settings} sessionId={view.sessionId} onChange={updateSettings} onNewGame={newGame} />
      <main className="container">
        <h2>💣 Bomb Risk Elicitation Task (BRET)</h2>
        <p className="hint">Open boxes sequentially. Stop whenever you like. The bomb is revealed only after you stop.</p>
        <StatusLine view={view} revealing={revealing} elapsedSec={elapsedSec} />
        <Controls view={view} revealing={revealing} onOpen={openNext} onStop={stop} />
        <hr />
        <BoxGrid view={view} />
        <hr />
        <SessionDetails record={record} upload={upload} onDownload={onDownload} />
        <p className="hint"><Link to="/records">Recorded sessions</Link></p>
      </main>
    </div>
  );
}
