/**
 * First visible row for a list, keeping the selection centered where possible.
 *
 * Lists that fit entirely start at 0. Otherwise the selection is centered
 * and the window is clamped so it never runs past either end.
 *
 * @param selected - Index of the selected item
 * @param total - Number of items in the list
 * @param visible - Number of rows available
 */
export function computeViewportStart(
    selected: number,
    total: number,
    visible: number,
): number {
    if (visible <= 0 || total <= visible) {
        return 0;
    }
    const centered = selected - Math.floor(visible / 2);
    return Math.min(Math.max(centered, 0), total - visible);
}
