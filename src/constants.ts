export const SERVER_NAME = 'tc-parse-mcp' as const;

export const TC_INFO = 'tc_info' as const;
export const TC_PARSE_OUTPUT = 'tc_parse_output' as const;
export const TC_GET_CALCTYPE = 'tc_get_calctype' as const;
export const TC_GET_VERSION = 'tc_get_version' as const;
export const TC_CHECK_SUCCESS = 'tc_check_success' as const;
export const TC_PARSE_MECI_DIR = 'tc_parse_meci_dir' as const;
export const TC_PARSE_FIELD = 'tc_parse_field' as const;
