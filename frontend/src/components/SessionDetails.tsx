import React, { useState } from 'react';
import type { TrialRecord } from '../engine/view';
import type { UploadStatus } from '../types';

function uploadText(upload: UploadStatus) {
  switch (upload.state) {
    case 'disabled': return 'Record upload is off (VITE_API_URL not set).';
    case 'idle': return 'Record is uploaded after reveal.';
    case 'sending': return 'Uploading record…';
    case 'sent': return 'Record uploaded.';
    case 'failed': return `Upload failed: ${upload.message}`;
  }
}

export default function SessionDetails({
  record,
  upload,
  onDownload,
}: {
  record: TrialRecord;
  upload: UploadStatus;
  onDownload: () => Promise<void>;
}) {
  const [error, setError] = useState<string | null>(null);

  async function download() {
    try {
      setError(null);
      await onDownload();
    } catch (e) {
      console.error('[export] zip failed', e);
      setError(e instanceof Error ? e.message : String(e));
    }
  }

  return (
    <details className="card">
      <summary>Session details / export</summary>
      <pre>{JSON.stringify(record, null, 2)}</pre>
      <div className="row">
        <button onClick={() => void download()}>Download ZIP</button>
        <span className="hint">{uploadText(upload)}</span>
      </div>
      {error && <p className="error">{error}</p>}
    </details>
  );
}
