/**
 * MCP Prompt: CSV chat usage
 */

export const CSV_CHAT_USAGE_PROMPT = {
  name: 'csv_chat_usage',
  description: 'How to load a CSV file and ask questions about it with the csv-chat tools',
  content: `# Chat with a CSV dataset

1. **Load** — \`load_csv\` with the CSV text, or upload the file to \`POST /sessions/{mcp-session-id}/upload\` (multipart, one \`.csv\` file).
2. **Inspect** — \`describe_dataset\` shows shape, column types, the first rows and summary statistics.
3. **Ask** — \`ask_question\` sends the question with the dataset profile to the model and returns its answer.
4. **Review** — \`get_history\` lists earlier questions and answers; \`clear_history\` starts over.

## Notes

- Loading a new file replaces the dataset but keeps the conversation.
- Empty questions are rejected and never reach the model.
- A failed question leaves the history unchanged; ask again right away.`,
};
