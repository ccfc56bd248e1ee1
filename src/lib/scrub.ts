/**
 * Text printed by sudo when it asks for the password inside a terminal.
 */
export const SUDO_PROMPT_MARKER = '[sudo] password for';

/**
 * @description Removes the echo of the priming password from captured stdout.
 *
 * When sudo prompted, every line holding the prompt or the password is dropped.
 * Without a prompt the terminal only echoed the typed password, which can only
 * be the first line. An empty password scrubs nothing.
 */
export function scrubSudoPassword(stdout: string, password: string): string {
  if (password.length === 0) {
    return stdout;
  }

  let lines = stdout.split('\n');

  if (lines.some((line) => line.includes(SUDO_PROMPT_MARKER))) {
    lines = lines.filter(
      (line) => !line.includes(password) && !line.includes(SUDO_PROMPT_MARKER)
    );
  } else if (lines.length > 0 && lines[0].includes(password)) {
    lines = lines.slice(1);
  }

  return lines.join('\n');
}
