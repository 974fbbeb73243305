/** Slash-command response payloads (Block Kit subset). */

export interface Text {
  type: "mrkdwn" | "plain_text";
  text: string;
}

export interface Block {
  type: "section";
  text: Text;
}

export interface SlashResponse {
  response_type?: "in_channel" | "ephemeral";
  blocks: Block[];
}

export const NOT_FOUND_MESSAGE = "couldnt find anything.... try something else or help me to add more ascii art";

export function codeBlock(text: string): Block {
  return { type: "section", text: { type: "mrkdwn", text: "```\n" + text + "\n```" } };
}

/** Leading and trailing newlines are dropped so the fence hugs the art. */
export function artResponse(blob: string): SlashResponse {
  return { response_type: "in_channel", blocks: [codeBlock(blob.replace(/^\n+|\n+$/g, ""))] };
}

/** Only the caller sees it. */
export function notFoundResponse(): SlashResponse {
  return { blocks: [codeBlock(NOT_FOUND_MESSAGE)] };
}
