import twilio from "twilio";
import type { TelephonyConfig } from "./types";

/** Returned whenever a call cannot be placed, for whatever reason */
export const EMERGENCY_FALLBACK_MESSAGE = "Emergency call could not be initiated. Please dial your local emergency number immediately.";

export function buildCallConfirmation(phone: string, callSid: string): string {
  return `A critical situation alert has been triggered. The emergency helpline is now calling ${phone}. Call SID: ${callSid}. Please stay safe and on the line.`;
}

/** The slice of the Twilio REST client used to place a call */
export interface CallClient {
  calls: {
    create(params: { to: string; from: string; url: string }): Promise<{ sid: string }>;
  };
}

export type CallClientFactory = (accountSid: string, authToken: string) => CallClient;

const createTwilioClient: CallClientFactory = (accountSid, authToken) => twilio(accountSid, authToken);

export interface EmergencyNotifier {
  /** Whether calls can be placed at all */
  readonly isConfigured: boolean;
  /**
   * Attempt an outbound call to `phone`.
   * Resolves to a confirmation or to EMERGENCY_FALLBACK_MESSAGE; never rejects.
   */
  callEmergencyServices(phone: string): Promise<string>;
}

/**
 * Places emergency calls through Twilio.
 *
 * Without telephony settings every call resolves to the fallback message.
 * There is no retry: a failed call is logged and answered with the fallback.
 */
export class TwilioEmergencyNotifier implements EmergencyNotifier {
  constructor(
    private readonly telephony: TelephonyConfig | undefined,
    private readonly clientFactory: CallClientFactory = createTwilioClient,
  ) {}

  get isConfigured(): boolean {
    return this.telephony !== undefined;
  }

  async callEmergencyServices(phone: string): Promise<string> {
    const to = phone.trim();
    if (!this.telephony) {
      console.log("[emergency] Telephony not configured, returning fallback");
      return EMERGENCY_FALLBACK_MESSAGE;
    }
    if (!to) {
      console.log("[emergency] No phone number available, returning fallback");
      return EMERGENCY_FALLBACK_MESSAGE;
    }

    try {
      const client = this.clientFactory(this.telephony.accountSid, this.telephony.authToken);
      const call = await client.calls.create({
        to,
        from: this.telephony.fromNumber,
        url: this.telephony.voiceUrl,
      });
      console.log(`[emergency] Call placed: sid=${call.sid}`);
      return buildCallConfirmation(to, call.sid);
    } catch (error) {
      console.error("[emergency] Call attempt failed:", error);
      return EMERGENCY_FALLBACK_MESSAGE;
    }
  }
}
