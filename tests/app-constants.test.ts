import test from "node:test";
import assert from "node:assert/strict";
import { formatTime, headerBadges, isDarkTheme, swipeDir } from "../src/app-constants.js";

test("formatTime renders minutes and seconds", () => {
  assert.equal(formatTime(0), "00:00");
  assert.equal(formatTime(61_500), "01:01");
  assert.equal(formatTime(600_000), "10:00");
});

test("swipeDir ignores short drags and follows the dominant axis", () => {
  assert.equal(swipeDir(12, 3, 20), null);
  assert.equal(swipeDir(-30, 10, 20), "left");
  assert.equal(swipeDir(25, -5, 20), "right");
  assert.equal(swipeDir(4, 40, 20), "down");
  assert.equal(swipeDir(-8, -21, 20), "up");
});

test("headerBadges shows the goal beside the timer unless the game is hardcore", () => {
  assert.deepEqual(headerBadges({ showTimer: true, undoRedoEnabled: true }), ["score", "best", "moves", "time", "goal"]);
  assert.deepEqual(headerBadges({ showTimer: false, undoRedoEnabled: true }), ["score", "best", "moves", "goal"]);
  assert.deepEqual(headerBadges({ showTimer: true, undoRedoEnabled: false }), ["score", "best", "moves", "time"]);
});

test("isDarkTheme follows the OS only for the system theme", () => {
  assert.equal(isDarkTheme("dark", false), true);
  assert.equal(isDarkTheme("light", true), false);
  assert.equal(isDarkTheme("system", true), true);
  assert.equal(isDarkTheme("system", false), false);
});
