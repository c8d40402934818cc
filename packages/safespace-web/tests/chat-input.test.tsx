import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import { ChatInput } from "../components/chat/chat-input";

describe("ChatInput", () => {
  it("is disabled until a session starts", () => {
    render(<ChatInput value="" onChange={vi.fn()} onSubmit={vi.fn()} isLoading={false} disabled />);

    const input = screen.getByLabelText("Message");
    expect(input).toBeDisabled();
    expect(input).toHaveAttribute("placeholder", "Start a session to begin chatting");
    expect(screen.getByRole("button", { name: "Send" })).toBeDisabled();
  });

  it("disables send for blank input", () => {
    render(<ChatInput value="   " onChange={vi.fn()} onSubmit={vi.fn()} isLoading={false} />);

    expect(screen.getByLabelText("Message")).toBeEnabled();
    expect(screen.getByRole("button", { name: "Send" })).toBeDisabled();
  });

  it("disables everything while a reply is pending", () => {
    render(<ChatInput value="hello" onChange={vi.fn()} onSubmit={vi.fn()} isLoading />);

    expect(screen.getByLabelText("Message")).toBeDisabled();
    expect(screen.getByRole("button", { name: "Send" })).toBeDisabled();
  });

  it("submits and reports changes", () => {
    const onChange = vi.fn();
    const onSubmit = vi.fn((event: React.FormEvent<HTMLFormElement>) => event.preventDefault());
    render(<ChatInput value="hello" onChange={onChange} onSubmit={onSubmit} isLoading={false} />);

    fireEvent.change(screen.getByLabelText("Message"), { target: { value: "hello there" } });
    fireEvent.click(screen.getByRole("button", { name: "Send" }));

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onSubmit).toHaveBeenCalledTimes(1);
  });
});
