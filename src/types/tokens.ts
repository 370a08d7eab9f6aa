/**
 * Resolved design tokens shared by static templates and components.
 */
export interface DesignTokens {
  fonts: {
    heading: string;
    body: string;
  };
  colors: {
    primary: string;
    secondary: string;
    accent: string;
    muted: string;
    background: string;
    text: string;
    /** Readable text color on top of the primary color. */
    onPrimary: string;
  };
  /** Spacing scale in px. */
  spacing: { sm: number; md: number; lg: number; xl: number };
  /** Corner radius in px. */
  radius: { sm: number; md: number; lg: number };
  maxWidth: number;
}
