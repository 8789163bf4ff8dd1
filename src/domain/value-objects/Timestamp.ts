const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, '0');
}

/** 解析 "Z" / "+09:00" / "+0900" / "+09" 為分鐘數；未標示時視為 UTC，超出範圍時回傳 null */
function parseOffset(raw: string | undefined): number | null {
  if (!raw || raw.toUpperCase() === 'Z') return 0;
  const sign = raw.startsWith('-') ? -1 : 1;
  const digits = raw.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours >= 24 || minutes >= 60) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * 帶 UTC offset 的不可變時間點
 *
 * 保留原字串中的 offset，讓 hour window 以擷取當地時間切分，
 * 序列化時也寫回同一個 offset。
 */
export class Timestamp {
  private constructor(
    public readonly ms: number,
    public readonly offsetMinutes: number,
  ) {}

  /** 解析 ISO 8601 字串，格式或日期欄位不合法時回傳 null */
  static parse(iso: string): Timestamp | null {
    const m = ISO_RE.exec(iso.trim());
    if (!m) return null;

    const [year, month, day, hour, minute] = [m[1], m[2], m[3], m[4], m[5]].map(Number);
    const second = m[6] ? Number(m[6]) : 0;
    const millis = m[7] ? Number(m[7].slice(0, 3).padEnd(3, '0')) : 0;
    const offsetMinutes = parseOffset(m[8]);
    if (offsetMinutes === null) return null;

    const local = Date.UTC(year, month - 1, day, hour, minute, second, millis);
    const check = new Date(local);
    // Date.UTC 會把 2月30日 之類的值進位，進位過就是不合法日期
    if (
      check.getUTCFullYear() !== year ||
      check.getUTCMonth() !== month - 1 ||
      check.getUTCDate() !== day ||
      check.getUTCHours() !== hour ||
      check.getUTCMinutes() !== minute ||
      check.getUTCSeconds() !== second
    ) {
      return null;
    }

    return new Timestamp(local - offsetMinutes * MS_PER_MINUTE, offsetMinutes);
  }

  static fromEpoch(ms: number, offsetMinutes: number = 0): Timestamp {
    return new Timestamp(ms, offsetMinutes);
  }

  /** 所在小時的起點（同一 offset 下的 HH:00:00） */
  hourStart(): Timestamp {
    const local = this.ms + this.offsetMinutes * MS_PER_MINUTE;
    const floored = local - (((local % MS_PER_HOUR) + MS_PER_HOUR) % MS_PER_HOUR);
    return new Timestamp(floored - this.offsetMinutes * MS_PER_MINUTE, this.offsetMinutes);
  }

  plusHours(hours: number): Timestamp {
    return new Timestamp(this.ms + hours * MS_PER_HOUR, this.offsetMinutes);
  }

  toISOString(): string {
    const d = new Date(this.ms + this.offsetMinutes * MS_PER_MINUTE);
    const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
    const millis = d.getUTCMilliseconds();
    const time =
      `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}` +
      (millis ? `.${pad(millis, 3)}` : '');

    if (this.offsetMinutes === 0) return `${date}T${time}Z`;
    const sign = this.offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(this.offsetMinutes);
    return `${date}T${time}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
  }

  toString(): string {
    return this.toISOString();
  }
}
