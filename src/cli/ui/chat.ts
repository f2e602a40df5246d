import process from "node:process";
import boxen from "boxen";
import chalk from "chalk";
import logUpdate from "log-update";
import ora from "ora";
import type { AgentEvent } from "../../agent/runtime/events.js";

const truncate = (value: string | undefined, max = 200): string | undefined => {
  if (!value) return value;
  return value.length > max ? `${value.slice(0, max)}...` : value;
};

export const createChatUI = (args: { userId: string; sessionId: string }): {
  onEvent: (event: AgentEvent) => void;
  showReply: (reply: string) => void;
  reset: () => void;
} => {
  const panelState: {
    intent: string;
    status: string;
    steps: number;
    failedSteps: number;
    lastError?: string;
  } = { intent: "-", status: "planning", steps: 0, failedSteps: 0 };

  let activeSpinner: ReturnType<typeof ora> | undefined;

  const renderPanel = (): void => {
    if (!process.stdout.isTTY) return;
    const body = [
      `${chalk.bold("User")}: ${args.userId}  ${chalk.bold("Session")}: ${args.sessionId}`,
      `${chalk.bold("Intent")}: ${panelState.intent}`,
      `${chalk.bold("Status")}: ${panelState.status}`,
      `${chalk.bold("Steps")}: ${panelState.steps} (${panelState.failedSteps} failed)`,
      `${chalk.bold("Last error")}: ${panelState.lastError ?? "-"}`
    ].join("\n");

    logUpdate(
      boxen(body, {
        borderColor: "cyan",
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        margin: { top: 0, bottom: 1 },
        title: "Turn",
        titleAlignment: "left"
      })
    );
  };

  const onEvent = (event: AgentEvent): void => {
    switch (event.type) {
      case "plan_validated":
        panelState.intent = event.intent;
        panelState.status = event.valid ? (event.repaired ? "executing (repaired plan)" : "executing") : "plan rejected";
        break;
      case "step_start":
        if (activeSpinner?.isSpinning) activeSpinner.stop();
        activeSpinner = ora(`step ${event.index + 1}: ${event.action}`).start();
        break;
      case "step_end": {
        panelState.steps += 1;
        const note = truncate(event.note, 200);
        if (!event.ok) {
          panelState.failedSteps += 1;
          panelState.lastError = note;
        }
        if (activeSpinner?.isSpinning) {
          if (event.ok) activeSpinner.succeed(`${event.action} ✓`);
          else activeSpinner.fail(`${event.action} ✗${note ? ` ${note}` : ""}`);
          activeSpinner = undefined;
        } else {
          console.log(`${event.ok ? "✓" : "✗"} ${event.action}${!event.ok && note ? ` ${note}` : ""}`);
        }
        break;
      }
      case "responded":
        panelState.status = event.fallback ? "responded (fallback)" : "responded";
        break;
      case "persisted":
        panelState.status = event.ok ? "done" : "done (session not saved)";
        break;
      default:
        break;
    }
    renderPanel();
  };

  const showReply = (reply: string): void => {
    if (process.stdout.isTTY) logUpdate.done();
    console.log(
      boxen(reply, {
        borderColor: "green",
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        title: "Assistant",
        titleAlignment: "left"
      })
    );
  };

  const reset = (): void => {
    panelState.intent = "-";
    panelState.status = "planning";
    panelState.steps = 0;
    panelState.failedSteps = 0;
    panelState.lastError = undefined;
  };

  return { onEvent, showReply, reset };
};
