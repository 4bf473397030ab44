import util from "util";

// stdout belongs to the JSON result (CLI) or to the MCP protocol (server).
const ALLOW_STDOUT_LOGS = process.env.OUTLINE_ALLOW_STDOUT_LOGS === "true";

if (!ALLOW_STDOUT_LOGS) {
    const redirect = (level: "info" | "debug") => (...args: unknown[]) => {
        if (level === "debug" && process.env.OUTLINE_DEBUG !== "true" && process.env.OUTLINE_LOG_LEVEL !== "debug") {
            return;
        }
        process.stderr.write(util.format(...args) + "\n");
    };

    console.log = redirect("info");
    console.info = redirect("info");
    console.debug = redirect("debug");
}
