interface ChatHeaderProps {
  /** Name the assistant introduces itself with */
  agentName: string;
  /** Display name of the current session, if one is running */
  userName?: string;
}

export function ChatHeader({ agentName, userName }: ChatHeaderProps) {
  return (
    <header className="border-b bg-white px-6 py-4 pl-16 md:pl-6">
      <h1 className="text-xl font-semibold">SafeSpace · {agentName}</h1>
      <p className="text-sm text-gray-500">{userName ? `Chatting with ${userName}` : "A calm place to talk"}</p>
    </header>
  );
}
