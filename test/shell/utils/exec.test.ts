// CHANGE: Tests for exit recovery and availability probes
// INVARIANT: numeric exit code on the error → ProcessOutput; anything else → not an exit

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import {
	captureOptions,
	exitOutputFromError,
	probeCommand,
} from "../../../src/shell/utils/exec.js";
import { exited, fakeRunner, notFound } from "../../utils/fakeRunner.js";

describe("exitOutputFromError", () => {
	it("recovers exit code and captured streams", () => {
		const error = Object.assign(new Error("Command failed"), {
			code: 1,
			stdout: "--- a.py\n",
			stderr: "warning\n",
		});
		expect(exitOutputFromError(error)).toEqual({
			exitCode: 1,
			stdout: "--- a.py\n",
			stderr: "warning\n",
		});
	});

	it("defaults missing streams to empty strings", () => {
		const error = Object.assign(new Error("Command failed"), { code: 3 });
		expect(exitOutputFromError(error)).toEqual({
			exitCode: 3,
			stdout: "",
			stderr: "",
		});
	});

	it("returns null for spawn failures and errors without a code", () => {
		const enoent = Object.assign(new Error("spawn ruff ENOENT"), {
			code: "ENOENT",
		});
		expect(exitOutputFromError(enoent)).toBeNull();
		expect(exitOutputFromError(new Error("boom"))).toBeNull();
	});

	it("does not treat an output overflow as an exit", () => {
		const overflow = Object.assign(
			new RangeError("stdout maxBuffer length exceeded"),
			{ code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER" },
		);
		expect(exitOutputFromError(overflow)).toBeNull();
	});
});

describe("captureOptions", () => {
	it("places no limit on captured output", () => {
		const controller = new AbortController();
		const options = captureOptions(controller.signal);
		expect(options.maxBuffer).toBe(Number.POSITIVE_INFINITY);
		expect(options.encoding).toBe("utf8");
		expect(options.signal).toBe(controller.signal);
	});
});

describe("probeCommand", () => {
	const probe = { command: "mypy", args: ["--version"] };

	it("is true when the tool exits 0", () => {
		const { runner, calls } = fakeRunner(() => exited(0, "mypy 1.11\n"));
		expect(Effect.runSync(probeCommand(probe, runner))).toBe(true);
		expect(calls).toEqual([probe]);
	});

	it("is false on a non-zero exit", () => {
		const { runner } = fakeRunner(() => exited(2));
		expect(Effect.runSync(probeCommand(probe, runner))).toBe(false);
	});

	it("is false when the tool cannot start", () => {
		const { runner } = fakeRunner(() => notFound("mypy"));
		expect(Effect.runSync(probeCommand(probe, runner))).toBe(false);
	});
});
