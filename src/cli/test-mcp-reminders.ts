import "dotenv/config";
import { fileURLToPath } from "node:url";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { readToolText } from "../mcp/tools/helpers.js";

const serverPath = fileURLToPath(new URL("../mcp/servers/reminders.ts", import.meta.url));
const transport = new StdioClientTransport({ command: process.execPath, args: ["--import", "tsx", serverPath] });
const client = new Client({ name: "lastwar-reminders-smoke-test", version: "0.1.0" });

await client.connect(transport);
const tools = await client.listTools();
console.log("tools:", tools.tools.map((t) => t.name));

const owner = { owner_id: "smoke-user", chat_id: "smoke-chat" };

const create = await client.callTool({ name: "reminder_create", arguments: { ...owner, kind: "truck", duration: "1h30m", lead_time: "5m" } });
console.log("reminder_create:", readToolText(create).text);

const create2 = await client.callTool({ name: "reminder_create", arguments: { ...owner, kind: "custom", task_name: "Shield", duration: "2h" } });
console.log("reminder_create_2:", readToolText(create2));

const bad = await client.callTool({ name: "reminder_create", arguments: { ...owner, kind: "build", duration: "soon" } });
console.log("reminder_create_invalid:", readToolText(bad));

const list = readToolText(await client.callTool({ name: "reminder_list", arguments: owner })).text;
console.log("reminder_list:", list);

const id = list.match(/\((lw:[^)]+)\)/)?.[1];
if (id) {
  const cancel = await client.callTool({ name: "reminder_cancel", arguments: { job_id: id } });
  console.log("reminder_cancel:", readToolText(cancel).text);
}

const all = await client.callTool({ name: "reminder_cancel_all", arguments: owner });
console.log("reminder_cancel_all:", readToolText(all).text);

await client.close();
