/**
 * Customer identity is restated in every prompt because the agent keeps no
 * memory between turns.
 */
export interface CustomerIdentity {
  name?: string;
  email?: string;
}

/** Loose email shape check for interactive input (anchored at the start only) */
const EMAIL_INPUT_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+/;

export function isValidEmailInput(value: string): boolean {
  return EMAIL_INPUT_PATTERN.test(value);
}

/**
 * Prefix the customer's message with who they are.
 * The name is only introduced on the first turn.
 */
export function buildTurnPrompt(message: string, identity: CustomerIdentity, firstTurn: boolean): string {
  const { name, email } = identity;
  if (firstTurn && name && email) {
    return `My name is ${name} and my email is ${email}. ${message}`;
  }
  if (email) {
    return `My email is ${email}. ${message}`;
  }
  if (firstTurn && name) {
    return `My name is ${name}. ${message}`;
  }
  return message;
}
