"use client";

import type { TranscriptEntry } from "@safespace/chat";
import { HeartHandshake, PhoneCall, Wrench } from "lucide-react";
import { Streamdown, streamdownComponents } from "@/lib/streamdown-config";
import { cn } from "@/lib/utils";

interface MessageBubbleProps {
  entry: TranscriptEntry;
}

export function MessageBubble({ entry }: MessageBubbleProps) {
  const isUser = entry.role === "user";

  return (
    <div className={cn("flex", isUser ? "justify-end" : "justify-start")}>
      <div className="flex flex-col max-w-[85%]">
        <div className={cn("rounded-lg px-4 py-2", isUser ? "bg-teal-600 text-white" : "bg-gray-100 text-gray-900")}>
          {isUser ? (
            <p className="whitespace-pre-wrap">{entry.text}</p>
          ) : (
            <div className="prose prose-sm max-w-none">
              <Streamdown components={streamdownComponents}>{entry.text}</Streamdown>
            </div>
          )}
        </div>
        {entry.toolCalled && <ToolCaption toolName={entry.toolCalled} />}
      </div>
    </div>
  );
}

function ToolIcon({ toolName }: { toolName: string }) {
  if (toolName === "call_emergency_services") return <PhoneCall className="h-3 w-3" aria-hidden="true" />;
  if (toolName === "ask_mental_health_specialist") return <HeartHandshake className="h-3 w-3" aria-hidden="true" />;
  return <Wrench className="h-3 w-3" aria-hidden="true" />;
}

function ToolCaption({ toolName }: { toolName: string }) {
  return (
    <p className="mt-1 flex items-center gap-1 text-xs text-gray-500">
      <ToolIcon toolName={toolName} />
      <span>Tool used: {toolName}</span>
    </p>
  );
}

export function ThinkingBubble({ agentName = "Friday" }: { agentName?: string }) {
  return (
    <div className="flex justify-start">
      <div className="bg-gray-200 rounded-lg px-4 py-2 text-gray-900">
        <p>{agentName} is thinking...</p>
      </div>
    </div>
  );
}

export function EmptyState() {
  return (
    <div className="text-center text-gray-500">
      <p className="text-lg">Welcome to SafeSpace</p>
      <p className="text-sm">Enter your name and phone in the sidebar, then start a session.</p>
    </div>
  );
}
