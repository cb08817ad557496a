/** Turns a stored title into its display form (emoji, typography and the like). */
export interface TitleFormatter {
  render(title: string): string
}

export const plainTitleFormatter: TitleFormatter = {
  render: (title) => title,
}
