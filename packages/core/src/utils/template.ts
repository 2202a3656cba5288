/** Replaces `{{name}}` placeholders; unknown names are left in place. */
export function renderTemplate(template: string, vars: Record<string, string | number>): string {
    return template.replace(/\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g, (match, name: string) => {
        const value = vars[name];
        return value === undefined ? match : String(value);
    });
}
