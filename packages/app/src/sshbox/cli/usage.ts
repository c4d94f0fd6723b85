export const usageText = `sshbox start [--no-sshd]
sshbox host-keys <restore|backup|status> [options]
sshbox volume setup
sshbox config
sshbox help

Commands:
  start               Provision the container and run sshd in the foreground
  host-keys restore   Copy SSH host keys from the volume into the host key directory
  host-keys backup    Wait for a complete host key set and copy it to the volume
  host-keys status    Show where each host key lives and whether both copies match
  volume setup        Fix volume ownership and create the standard directories
  config              Print the resolved configuration (secrets redacted)

Options:
  --no-sshd                 Provision only; do not start sshd or schedule a key backup (start)
  --timeout-ms <ms>         How long to wait for a complete key set (backup, default: 30000)
  --poll-interval-ms <ms>   How often to look for the key set (backup, default: 500)
  -h, --help                Show this help

Environment:
  SSH_USERNAME, SSH_PASSWORD     Login user credentials (default: myuser / mypassword)
  ROOT_PASSWORD                  Root password (unchanged when unset)
  AUTHORIZED_KEYS                Public keys for the login user; disables password login
  HOST, HOSTNAME                 Bind address exported to sshd (default: 0.0.0.0)
  TZ                             Timezone under /usr/share/zoneinfo
  SSH_BANNER                     Pre-login banner text
  LOG_LEVEL                      sshd LogLevel and sshbox log verbosity (default: INFO)
  SSHBOX_VOLUME_PATH             Persistent volume (default: /home/<user>/code-project/WORKSPACE)
  SSHBOX_VOLUME_UID, _GID        Volume owner (default: 1000:1000)
  SSHBOX_HOST_KEY_DIR            Host key directory read by sshd (default: /etc/ssh)
  SSHBOX_HOST_KEY_BACKUP_DIR     Durable host key copy (default: <volume>/ssh_host_keys)
  SSHBOX_BACKUP_POLL_INTERVAL_MS Key backup poll interval (default: 500)
  SSHBOX_BACKUP_TIMEOUT_MS       Key backup wait bound (default: 30000)
  SSHBOX_SSHD_PATH               sshd binary (default: /usr/sbin/sshd)
  SSHBOX_SSHD_CONFIG             sshd configuration file (default: /etc/ssh/sshd_config)
`
