// CHANGE: Tests for revision-range enumeration and commit log reads over a fake git
// INVARIANT: history query failure → ExecutionError; single commit failure → null

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import {
	listCommitIds,
	readCommitLog,
	readCommitRecord,
} from "../../../src/shell/git/history.js";
import { exited, fakeRunner, notFound } from "../../utils/fakeRunner.js";

describe("listCommitIds", () => {
	it("queries git log for the range and returns ids in git's order", () => {
		const { runner, calls } = fakeRunner(() => exited(0, "c2\nc1\n"));
		expect(Effect.runSync(listCommitIds("base", "head", runner))).toEqual([
			"c2",
			"c1",
		]);
		expect(calls).toEqual([
			{ command: "git", args: ["log", "--pretty=format:%H", "base..head"] },
		]);
	});

	it("returns no ids for an empty range", () => {
		const { runner } = fakeRunner(() => exited(0, ""));
		expect(Effect.runSync(listCommitIds("head", "head", runner))).toEqual([]);
	});

	it("fails with ExecutionError carrying git's stderr", () => {
		const { runner } = fakeRunner(() =>
			exited(128, "", "fatal: bad revision 'nope'\n"),
		);
		const error = Effect.runSync(
			Effect.flip(listCommitIds("nope", "head", runner)),
		);
		expect(error._tag).toBe("ExecutionError");
		expect(error.detail).toBe("fatal: bad revision 'nope'");
		expect(error.command).toBe("git log --pretty=format:%H nope..head");
	});

	it("describes the exit code when git prints nothing", () => {
		const { runner } = fakeRunner(() => exited(129));
		const error = Effect.runSync(
			Effect.flip(listCommitIds("a", "b", runner)),
		);
		expect(error.detail).toBe("exited with code 129");
	});

	it("fails with ExecutionError when git cannot start", () => {
		const { runner } = fakeRunner(() => notFound("git"));
		const error = Effect.runSync(
			Effect.flip(listCommitIds("a", "b", runner)),
		);
		expect(error.detail).toBe("spawn git ENOENT");
	});
});

describe("readCommitLog / readCommitRecord", () => {
	const shown =
		"feat[CORE]: add x\n\nProblem: p\nAuthor: John Doe <jdoe@is.ic>\n";

	it("asks git show for the message and the author trailer", () => {
		const { runner, calls } = fakeRunner(() => exited(0, shown));
		Effect.runSync(readCommitLog("c1", runner));
		expect(calls).toEqual([
			{
				command: "git",
				args: ["show", "-s", "--format=%B%nAuthor: %an <%ae>", "c1"],
			},
		]);
	});

	it("moves the trailer into the author fields", () => {
		const { runner } = fakeRunner(() => exited(0, shown));
		expect(Effect.runSync(readCommitRecord("c1", runner))).toEqual({
			id: "c1",
			message: "feat[CORE]: add x\n\nProblem: p",
			authorName: "John Doe",
			authorEmail: "jdoe@is.ic",
		});
	});

	it("leaves an empty body when the commit has no message", () => {
		const { runner } = fakeRunner(() =>
			exited(0, "\nAuthor: jdoe <jdoe@is.ic>\n"),
		);
		expect(Effect.runSync(readCommitRecord("c1", runner))).toEqual({
			id: "c1",
			message: "",
			authorName: "jdoe",
			authorEmail: "jdoe@is.ic",
		});
	});

	it("keeps the whole text when the last line is not a trailer", () => {
		const { runner } = fakeRunner(() => exited(0, "fix[UI]: x\nTest: t\n"));
		expect(Effect.runSync(readCommitRecord("c1", runner))).toEqual({
			id: "c1",
			message: "fix[UI]: x\nTest: t",
			authorName: "",
			authorEmail: "",
		});
	});

	it("returns null when git fails or prints nothing", () => {
		const failing = fakeRunner(() => exited(128, "", "fatal: bad object"));
		const blank = fakeRunner(() => exited(0, "  \n"));
		const missing = fakeRunner(() => notFound("git"));
		expect(Effect.runSync(readCommitRecord("c1", failing.runner))).toBeNull();
		expect(Effect.runSync(readCommitRecord("c1", blank.runner))).toBeNull();
		expect(Effect.runSync(readCommitLog("c1", missing.runner))).toBeNull();
	});
});
