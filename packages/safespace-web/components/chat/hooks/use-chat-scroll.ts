import { useEffect, useRef } from "react";

/**
 * Keeps the transcript pinned to the newest entry.
 */
export function useChatScroll(entryCount: number, isLoading: boolean) {
  const containerRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;
    // jsdom has no scrollTo
    if (typeof container.scrollTo === "function") {
      container.scrollTo({ top: container.scrollHeight, behavior: "smooth" });
    }
  }, [entryCount, isLoading]);

  return { containerRef };
}
