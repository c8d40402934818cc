interface ChatInputProps {
  /** Current input value */
  value: string;
  /** Called when input changes */
  onChange: (event: React.ChangeEvent<HTMLInputElement>) => void;
  /** Called when form is submitted */
  onSubmit: (event: React.FormEvent<HTMLFormElement>) => void;
  /** Whether a reply is pending */
  isLoading: boolean;
  /** No session yet */
  disabled?: boolean;
}

export function ChatInput({ value, onChange, onSubmit, isLoading, disabled = false }: ChatInputProps) {
  const inactive = isLoading || disabled;

  return (
    <form onSubmit={onSubmit} className="border-t bg-white p-4">
      <div className="mx-auto max-w-3xl flex gap-2">
        <input
          type="text"
          value={value}
          onChange={onChange}
          placeholder={disabled ? "Start a session to begin chatting" : "Type your message..."}
          aria-label="Message"
          disabled={inactive}
          className="flex-1 rounded-lg border border-gray-300 px-4 py-2 focus:outline-none focus:ring-2 focus:ring-teal-500 disabled:opacity-50"
        />
        <button type="submit" disabled={inactive || !value.trim()} className="rounded-lg bg-teal-600 px-6 py-2 text-white hover:bg-teal-700 disabled:opacity-50 disabled:cursor-not-allowed">
          Send
        </button>
      </div>
    </form>
  );
}
