export function maskEmail(email: string): string {
  const at = email.lastIndexOf("@");
  if (at <= 0 || at === email.length - 1) {
    return "***";
  }
  return `${email.slice(0, Math.min(2, at))}***@${email.slice(at + 1)}`;
}

export function maskPhone(phone: string): string {
  const digits = phone.replace(/\D/g, "");
  if (digits.length < 4) {
    return "***-***";
  }
  return `***-***-${digits.slice(-4)}`;
}
