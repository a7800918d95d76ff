export const INSTRUCTIONS = `
# fitrepo

This server manages a Fossil repository that aggregates several git
repositories, each under its own subdirectory (its subtree):

- **Inspect:** \`list_subtrees\` (registered subtrees, their sources and last sync)
- **Sync:** \`sync_subtree\` with \`direction: "update"\` (git → Fossil) or
  \`direction: "push"\` (Fossil → git, then publish to the source)
- **Recover:** \`reset_marks\` (forget the transfer history of a subtree)

## Branches

Every branch of a subtree lives in the aggregate under the subtree's prefix:
\`libs/foo\` becomes \`libs__foo/<branch>\`. A push picks the branch to send
back from that namespace only. When a subtree has several branches, pass
\`branch\` explicitly.

## Cautions

- Syncs of the same aggregate run one at a time; a busy error means another
  process is syncing. Retry later.
- \`reset_marks\` makes the next sync re-transfer the full history. Only use it
  when a sync keeps failing on a marks mismatch.
- Concurrent edits to the same files in the source and the aggregate are not
  reconciled; sync before editing on the other side.
`.trim();
