/**
 * Starter config written by `stowage config init`
 */

export const CONFIG_TEMPLATE = `# stowage configuration

s3:
  bucket: my-backups
  prefix: backups
  # region: us-east-1
  # endpoint: https://s3.example.com   # S3-compatible providers
  # accessKeyId / secretAccessKey fall back to AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY

services:
  app:
    paths:
      data: /var/lib/app/data
      uploads: /var/lib/app/uploads
    # Only archive these subfolders of a path
    includeFolders:
      data: [db, config]

# Days to keep archives
retention: 14

# Prune a service right after backing it up (always keeps the newest archive)
autoCleanup: false

notifications:
  # discordWebhook: https://discord.com/api/webhooks/...
  onSuccess: false
  onError: true
  onWarning: true

backup:
  # tempDir: ./tmp
  preserveAcls: false
  compression: true
  # Reject archives smaller than this many bytes
  minSize: 0
`;
