"use client";

import { useState } from "react";

interface ChatLayoutProps {
  sidebar: React.ReactNode;
  children: React.ReactNode;
}

export function ChatLayout({ sidebar, children }: ChatLayoutProps) {
  const [isMobileOpen, setIsMobileOpen] = useState(false);

  return (
    <div className="flex h-screen">
      {/* Mobile overlay */}
      {isMobileOpen && <div className="fixed inset-0 z-40 bg-black/50 md:hidden" onClick={() => setIsMobileOpen(false)} />}

      <div className={`${isMobileOpen ? "translate-x-0" : "-translate-x-full md:translate-x-0"} fixed md:relative z-50 h-full w-72 transition-all duration-200 ease-in-out`}>{sidebar}</div>

      <div className="flex-1 flex flex-col min-w-0">
        <button onClick={() => setIsMobileOpen(true)} className="md:hidden fixed top-4 left-4 z-30 p-2 rounded-lg bg-white shadow-md border" aria-label="Open sidebar">
          <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M4 6h16M4 12h16M4 18h16" />
          </svg>
        </button>

        {children}
      </div>
    </div>
  );
}
