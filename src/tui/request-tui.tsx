import React, { useEffect, useState } from "react";
import { Box, Text, render, useApp, useInput } from "ink";
import type { BoardEntry, RequestBoard } from "../handoff/request-board.js";

interface RequestAppProps {
  board: RequestBoard;
  now?: () => number;
}

export const timeAgo = (timestampMs: number, nowMs: number): string => {
  const seconds = Math.max(0, Math.floor((nowMs - timestampMs) / 1000));
  if (seconds < 60) {
    return `${seconds}s ago`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ago`;
  }
  return `${Math.floor(minutes / 60)}h ago`;
};

export const truncate = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + "…";
};

export const describeEntry = (entry: BoardEntry, nowMs: number): string => {
  const parts = [entry.session];
  if (entry.locked) {
    parts.push("[LOCKED]");
  }
  if (entry.request?.status === "pending") {
    parts.push(`REQUEST: ${truncate(entry.request.message, 50)} (${timeAgo(entry.request.createdAt, nowMs)})`);
  } else if (entry.request?.status === "completed") {
    parts.push("[DONE]");
  }
  if (entry.attachedClients > 0) {
    parts.push(`attached: ${entry.attachedClients}`);
  }
  return parts.join("  ");
};

export const RequestApp: React.FC<RequestAppProps> = ({ board, now = Date.now }) => {
  const [entries, setEntries] = useState<BoardEntry[]>(board.getEntries());
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [notice, setNotice] = useState<string>("");
  const [, setTick] = useState(0);
  const { exit } = useApp();

  useEffect(() => {
    const refresh = (next: BoardEntry[]): void => {
      setEntries(next);
    };
    const report = (error: Error): void => {
      setNotice(error.message);
    };
    board.on("update", refresh);
    board.on("error", report);
    return () => {
      board.off("update", refresh);
      board.off("error", report);
    };
  }, [board]);

  // Keeps the age labels moving.
  useEffect(() => {
    const interval = setInterval(() => setTick((t) => t + 1), 5000);
    return () => clearInterval(interval);
  }, []);

  useEffect(() => {
    if (selectedIndex >= entries.length) {
      setSelectedIndex(Math.max(0, entries.length - 1));
    }
  }, [entries.length, selectedIndex]);

  const runAction = (action: Promise<string>): void => {
    action.then(setNotice, (error: unknown) => {
      setNotice(error instanceof Error ? error.message : String(error));
    });
  };

  useInput((input, key) => {
    const entry = entries[selectedIndex];
    if (key.upArrow) {
      setSelectedIndex((i) => Math.max(0, i - 1));
    } else if (key.downArrow) {
      setSelectedIndex((i) => Math.min(entries.length - 1, i + 1));
    } else if (input === "d" && entry) {
      runAction(
        board
          .complete(entry.session)
          .then((completed) =>
            completed
              ? `Marked request done for session '${entry.session}'`
              : `No pending request for session '${entry.session}'`
          )
      );
    } else if (input === "l" && entry) {
      runAction(
        board
          .toggleLock(entry.session)
          .then((locked) => `${locked ? "Locked" : "Unlocked"} session '${entry.session}'`)
      );
    } else if (input === "q") {
      exit();
    }
  });

  const pendingCount = entries.filter((entry) => entry.request?.status === "pending").length;

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          Sessions
        </Text>
        <Text dimColor> | </Text>
        <Text dimColor>
          {"↑↓"} navigate {"  "}
          <Text color="green">d</Text> done {"  "}
          <Text color="yellow">l</Text> lock/unlock {"  "}
          <Text dimColor>q</Text> quit
        </Text>
      </Box>

      {entries.length === 0 ? (
        <Text dimColor>No sessions</Text>
      ) : (
        entries.map((entry, index) => {
          const isSelected = index === selectedIndex;
          const isPending = entry.request?.status === "pending";
          return (
            <Box key={entry.session}>
              <Text color={isSelected ? "cyan" : isPending ? "yellow" : undefined} bold={isSelected}>
                {isSelected ? "▶ " : "  "}
                {describeEntry(entry, now())}
              </Text>
            </Box>
          );
        })
      )}

      <Box marginTop={1}>
        <Text dimColor>{pendingCount === 1 ? "1 pending request" : `${pendingCount} pending requests`}</Text>
      </Box>
      {notice !== "" ? <Text>{notice}</Text> : null}
    </Box>
  );
};

/** Renders the board until the human quits. */
export const runRequestTui = async (board: RequestBoard): Promise<void> => {
  await board.start();
  const app = render(<RequestApp board={board} />);
  try {
    await app.waitUntilExit();
  } finally {
    board.stop();
  }
};
