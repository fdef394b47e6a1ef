import { getOptionalBoolean } from "../utils/validation";

/**
 * Default conversion switches; CLI flags and interactive answers override them
 */
export interface ConversionConfig {
  recursive: boolean;
  sort: boolean;
  includeCustomFields: boolean;
  includeRawItemXml: boolean;
  beautify: boolean;
  failFast: boolean;
}

/**
 * Retrieves and validates conversion defaults from environment variables
 */
export function getConversionConfig(): ConversionConfig {
  return {
    recursive: getOptionalBoolean(
      "JIRA_JSONL_RECURSIVE",
      process.env.JIRA_JSONL_RECURSIVE,
      false
    ),
    sort: getOptionalBoolean("JIRA_JSONL_SORT", process.env.JIRA_JSONL_SORT, false),
    includeCustomFields: getOptionalBoolean(
      "JIRA_JSONL_INCLUDE_CUSTOMFIELDS",
      process.env.JIRA_JSONL_INCLUDE_CUSTOMFIELDS,
      false
    ),
    includeRawItemXml: getOptionalBoolean(
      "JIRA_JSONL_INCLUDE_RAW_ITEM_XML",
      process.env.JIRA_JSONL_INCLUDE_RAW_ITEM_XML,
      false
    ),
    beautify: getOptionalBoolean(
      "JIRA_JSONL_BEAUTIFY",
      process.env.JIRA_JSONL_BEAUTIFY,
      false
    ),
    failFast: getOptionalBoolean(
      "JIRA_JSONL_FAIL_FAST",
      process.env.JIRA_JSONL_FAIL_FAST,
      false
    ),
  };
}
