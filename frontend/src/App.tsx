import React from 'react';
import { Routes, Route } from 'react-router-dom';
import Task from './pages/Task';
import Records from './pages/Records';
import { recordsClient } from './services/records';

export default function App() {
  return (
    <Routes>
      <Route path="/" element={<Task />} />
      <Route path="/records" element={<Records client={recordsClient} />} />
    </Routes>
  );
}
