export type CliCommand =
  | { kind: "init-db" }
  | { kind: "chat"; userId: string; sessionId: string; message?: string }
  | { kind: "session-show"; userId: string; sessionId: string }
  | { kind: "session-clear"; userId: string; sessionId: string }
  | { kind: "memory"; userId: string }
  | { kind: "help"; error?: string };

type Flags = { user?: string; session?: string; positional: string[] };

const readFlags = (argv: string[]): Flags => {
  const flags: Flags = { positional: [] };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--user" || arg === "-u") {
      flags.user = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--session" || arg === "-s") {
      flags.session = argv[i + 1];
      i += 1;
      continue;
    }
    flags.positional.push(arg);
  }
  return flags;
};

export const parseCliArgs = (argv: string[]): CliCommand => {
  const [command, ...rest] = argv;
  const flags = readFlags(rest);

  switch (command) {
    case "init-db":
      return { kind: "init-db" };
    case "chat": {
      if (!flags.user) return { kind: "help", error: "chat requires --user <id>" };
      const message = flags.positional.join(" ").trim();
      return { kind: "chat", userId: flags.user, sessionId: flags.session ?? "default", message: message || undefined };
    }
    case "session": {
      const [action] = flags.positional;
      if (!flags.user || !flags.session) return { kind: "help", error: "session commands require --user <id> and --session <id>" };
      if (action === "show") return { kind: "session-show", userId: flags.user, sessionId: flags.session };
      if (action === "clear") return { kind: "session-clear", userId: flags.user, sessionId: flags.session };
      return { kind: "help", error: `unknown session action: ${action ?? "<none>"}` };
    }
    case "memory":
      if (!flags.user) return { kind: "help", error: "memory requires --user <id>" };
      return { kind: "memory", userId: flags.user };
    case undefined:
    case "help":
    case "--help":
      return { kind: "help" };
    default:
      return { kind: "help", error: `unknown command: ${command}` };
  }
};

export const USAGE = [
  "Usage:",
  "- retail-agent init-db",
  "- retail-agent chat --user <id> [--session <id>] [message]",
  "- retail-agent session show|clear --user <id> --session <id>",
  "- retail-agent memory --user <id>"
].join("\n");
