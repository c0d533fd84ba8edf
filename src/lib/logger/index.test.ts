import { describe, expect, it } from "vitest";
import { createLogger, isLogLevel } from "./index.js";

function capture() {
	const lines: string[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	};
}

function parsed(lines: readonly string[]): Record<string, unknown>[] {
	return lines.map((line) => JSON.parse(line));
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("writes JSON lines with message and fields", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out.destination });

			logger.info({ records: 1440 }, "series written");

			const [line] = parsed(out.lines);
			expect(line?.msg).toBe("series written");
			expect(line?.records).toBe(1440);
			expect(line?.level).toBe(30);
		});

		it("binds the logger name", () => {
			const out = capture();
			const logger = createLogger({ level: "info", name: "fxsynth", destination: out.destination });

			logger.warn("careful");

			expect(parsed(out.lines)[0]?.name).toBe("fxsynth");
		});

		it("child logger carries bound context", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out.destination });
			const child = logger.child({ module: "sink" }).child({ file: "data.csv" });

			child.error("write failed");

			const [line] = parsed(out.lines);
			expect(line?.module).toBe("sink");
			expect(line?.file).toBe("data.csv");
			expect(line?.msg).toBe("write failed");
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const out = capture();
			const logger = createLogger({ level: "warn", destination: out.destination });

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(out.lines).toHaveLength(1);
			expect(out.lines[0]).toContain("should appear");
		});

		it("debug level lets debug lines through", () => {
			const out = capture();
			const logger = createLogger({ level: "debug", destination: out.destination });

			logger.debug({ step: 1 }, "detail");

			expect(parsed(out.lines)[0]?.level).toBe(20);
		});

		it("isLogLevel narrows known level names only", () => {
			expect(isLogLevel("debug")).toBe(true);
			expect(isLogLevel("fatal")).toBe(true);
			expect(isLogLevel("verbose")).toBe(false);
			expect(isLogLevel("DEBUG")).toBe(false);
		});
	});

	describe("adversarial", () => {
		it("does not throw when logging undefined or null values", () => {
			const logger = createLogger({ level: "info", destination: capture().destination });
			expect(() => logger.info(undefined as unknown as string)).not.toThrow();
			expect(() => logger.info(null as unknown as string)).not.toThrow();
		});

		it("handles circular references", () => {
			const logger = createLogger({ level: "info", destination: capture().destination });
			const circular: Record<string, unknown> = { name: "test" };
			circular.self = circular;

			expect(() => logger.info(circular, "circular test")).not.toThrow();
		});
	});
});
