import blessed from "blessed";
import { errorMessage } from "./rag/errors.js";
import type { RunCoordinator } from "./rag/pipeline.js";
import type { Log } from "./rag/types.js";

export interface ChatOptions {
  title: string;
  /** Refresh the corpus in the background before the first question. */
  refreshOnStart: boolean;
}

/** `connect` receives a log that writes into the chat window. */
export function startChat(connect: (log: Log) => RunCoordinator, options: ChatOptions): void {
  let busy = false;
  let ready = !options.refreshOnStart;

  // ── UI Setup ──────────────────────────────────────────────────────────────
  const screen = blessed.screen({
    smartCSR: true,
    title: options.title,
  });

  const chatBox = blessed.log({
    parent: screen,
    top: 0,
    left: 0,
    width: "100%",
    height: "100%-3",
    scrollable: true,
    alwaysScroll: true,
    scrollbar: {
      ch: "│",
      style: { bg: "blue" },
    },
    border: { type: "line" },
    style: {
      border: { fg: "blue" },
    },
    label: ` ${options.title} `,
    tags: true,
    mouse: true,
  });

  const inputBox = blessed.textbox({
    parent: screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: 3,
    border: { type: "line" },
    style: {
      border: { fg: "green" },
      focus: { border: { fg: "yellow" } },
    },
    label: " ask > ",
    inputOnFocus: false,
    mouse: true,
  });

  const inputFrame: blessed.Widgets.BoxElement = inputBox;

  screen.key(["C-c"], () => process.exit(0));
  inputBox.key(["C-c"], () => process.exit(0));

  // Re-focus input whenever it loses focus; setTimeout breaks the blur→focus→render loop.
  inputBox.on("blur", () => {
    if (!busy) setTimeout(() => promptInput(), 0);
  });

  function promptInput(): void {
    inputBox.readInput(() => {/* handled by submit event */});
  }

  function logGrey(msg: string): void {
    chatBox.log(`{grey-fg}${blessed.escape(msg)}{/}`);
    screen.render();
  }

  const coordinator = connect(logGrey);

  // ── Spinner ───────────────────────────────────────────────────────────────
  const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let spinIdx = 0;
  let spinTimer: ReturnType<typeof setInterval> | null = null;
  let spinElapsed = 0;
  let spinLabel = "";

  function dropSpinnerLine(): void {
    const lines = chatBox.getLines();
    const lastIdx = lines.length - 1;
    const last = lines[lastIdx];
    if (spinLabel && last !== undefined && last.includes(spinLabel)) {
      chatBox.deleteLine(lastIdx);
    }
  }

  function drawSpinner(): void {
    dropSpinnerLine();
    const secs = (spinElapsed / 1000).toFixed(1);
    chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
    screen.render();
  }

  function startSpinner(label: string): void {
    stopSpinner();
    spinLabel = label;
    spinIdx = 0;
    spinElapsed = 0;
    drawSpinner();
    spinTimer = setInterval(() => {
      spinIdx = (spinIdx + 1) % spinFrames.length;
      spinElapsed += 100;
      drawSpinner();
    }, 100);
  }

  function stopSpinner(): void {
    if (spinTimer) {
      clearInterval(spinTimer);
      spinTimer = null;
    }
    dropSpinnerLine();
    spinLabel = "";
  }

  // ── Question Handling ─────────────────────────────────────────────────────
  async function answerQuestion(question: string): Promise<void> {
    startSpinner("searching documents");
    const result = await coordinator.ask(question);
    stopSpinner();

    if (!result.grounded) {
      chatBox.log("{yellow-fg}  no grounded answer available{/}");
    } else {
      chatBox.log(`{grey-fg}  ✓ 📄 ${blessed.escape(result.sources)}{/}`);
    }
    for (const line of result.answer.split("\n")) {
      chatBox.log("  " + blessed.escape(line));
    }
    screen.render();
  }

  inputBox.on("submit", (value: string) => {
    const text = value.trim();
    inputBox.clearValue();
    screen.render();

    if (!text || busy) {
      promptInput();
      return;
    }
    if (!ready) {
      logGrey("corpus is still loading, try again in a moment");
      promptInput();
      return;
    }

    chatBox.log(`{green-fg}ask >{/} ${blessed.escape(text)}`);
    busy = true;
    inputBox.style.border.fg = "grey";
    inputFrame.setLabel(" ... ");
    screen.render();

    answerQuestion(text)
      .catch((err: unknown) => {
        stopSpinner();
        chatBox.log(`{red-fg}error:{/} ${blessed.escape(errorMessage(err))}`);
      })
      .finally(() => {
        busy = false;
        chatBox.log("");
        inputBox.style.border.fg = "green";
        inputFrame.setLabel(" ask > ");
        screen.render();
        promptInput();
      });
  });

  inputBox.key(["escape"], () => {
    inputBox.cancel();
  });

  chatBox.log("Ask a question about your documents. Ctrl+C to quit.");
  chatBox.log("");
  screen.render();

  // ── Corpus refresh (non-blocking) ─────────────────────────────────────────
  if (options.refreshOnStart) {
    coordinator
      .run()
      .then((report) => {
        const failed = report.totals.failed;
        if (failed > 0) {
          chatBox.log(`{yellow-fg}${failed} document(s) failed to process, see the run report{/}`);
        }
        chatBox.log("");
      })
      .catch((err: unknown) => {
        chatBox.log(`{yellow-fg}corpus refresh failed: ${blessed.escape(errorMessage(err))}{/}`);
      })
      .finally(() => {
        ready = true;
        screen.render();
      });
  }

  promptInput();
}
