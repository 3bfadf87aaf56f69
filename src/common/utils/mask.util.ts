/** 앞 4자리만 남기고 가림 (짧은 값은 전부 가림) */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 4)}****`;
}
