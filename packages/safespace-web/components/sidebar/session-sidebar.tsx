"use client";

import { useState } from "react";
import { Eraser, RotateCcw, Play } from "lucide-react";

interface SessionSidebarProps {
  /** Whether a session is running */
  hasSession: boolean;
  /** Disable the buttons while a request is pending */
  isBusy: boolean;
  /** Start a session, or restart with the given details */
  onStart: (name: string, phone: string) => void;
  /** Empty the transcript of the running session */
  onClear: () => void;
}

export function SessionSidebar({ hasSession, isBusy, onStart, onClear }: SessionSidebarProps) {
  const [name, setName] = useState("");
  const [phone, setPhone] = useState("");

  const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onStart(name, phone);
  };

  return (
    <aside className="flex h-full flex-col gap-6 border-r bg-gray-50 p-4">
      <div>
        <h2 className="text-lg font-semibold">Your session</h2>
        <p className="text-xs text-gray-500">Nothing you share is stored after the server restarts.</p>
      </div>

      <form onSubmit={handleSubmit} className="flex flex-col gap-3">
        <label className="flex flex-col gap-1 text-sm">
          <span>Your name</span>
          <input type="text" value={name} onChange={(e) => setName(e.target.value)} className="rounded-lg border border-gray-300 px-3 py-2 focus:outline-none focus:ring-2 focus:ring-teal-500" />
        </label>
        <label className="flex flex-col gap-1 text-sm">
          <span>Your phone (for emergencies)</span>
          <input type="tel" value={phone} onChange={(e) => setPhone(e.target.value)} placeholder="+15551234567" className="rounded-lg border border-gray-300 px-3 py-2 focus:outline-none focus:ring-2 focus:ring-teal-500" />
          <span className="text-xs text-gray-500">Optional but recommended for safety.</span>
        </label>
        <button type="submit" disabled={isBusy} className="flex items-center justify-center gap-2 rounded-lg bg-teal-600 px-4 py-2 text-white hover:bg-teal-700 disabled:opacity-50">
          {hasSession ? <RotateCcw className="h-4 w-4" aria-hidden="true" /> : <Play className="h-4 w-4" aria-hidden="true" />}
          {hasSession ? "Restart" : "Start session"}
        </button>
      </form>

      <button type="button" onClick={onClear} disabled={isBusy || !hasSession} className="flex items-center justify-center gap-2 rounded-lg border border-gray-300 px-4 py-2 text-gray-700 hover:bg-gray-100 disabled:opacity-50">
        <Eraser className="h-4 w-4" aria-hidden="true" />
        Clear chat
      </button>
    </aside>
  );
}
