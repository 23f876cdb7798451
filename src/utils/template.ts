export function fillTemplate(template: string, vars: Record<string, string>): string {
  let result = template;
  for (const [k, v] of Object.entries(vars)) {
    // function replacer: "$&" and friends in paper text must stay literal
    result = result.replace(new RegExp(`\\{\\{${k}\\}\\}`, "g"), () => v);
  }
  return result;
}
