/**
 * First `maxLength` UTF-16 units of `text`, backing off one unit rather
 * than ending on the high half of a surrogate pair (emoji and other
 * astral characters).
 */
export function clipText(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    const clipped = text.slice(0, Math.max(0, maxLength));
    const last = clipped.charCodeAt(clipped.length - 1);
    return last >= 0xd800 && last <= 0xdbff ? clipped.slice(0, -1) : clipped;
}
