export const describeId = (id: number | undefined): string => (id === undefined ? '(no id)' : String(id))
