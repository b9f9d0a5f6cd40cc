import figlet from "figlet";
import { logger } from "./logger.js";

/**
 * Generate ASCII art text for the banner
 * @param msg - Message to convert to ASCII art
 * @returns ASCII art string, or the plain message if figlet cannot render it
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.debug("Font rendering failed:", error);
    return msg;
  }
};
