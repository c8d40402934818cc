// Streamdown configuration for rendering assistant replies as markdown

import type { ReactNode, ComponentType, JSX } from "react";
import { Streamdown } from "streamdown";

// Components type from streamdown (not exported directly)
type Components = {
  [Key in keyof JSX.IntrinsicElements]?: ComponentType<JSX.IntrinsicElements[Key]> | keyof JSX.IntrinsicElements;
};

/**
 * Custom components for Streamdown to use for rendering
 */
export const streamdownComponents: Components = {
  // Links in replies (helplines, resources) open in a new tab
  a: ({ href, children }: { href?: string; children?: ReactNode }) => (
    <a href={href} target="_blank" rel="noopener noreferrer" className="text-teal-700 underline hover:text-teal-900">
      {children}
    </a>
  ),
};

export { Streamdown };
