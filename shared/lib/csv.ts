export interface DelimitedOptions {
  delimiter?: string;
}

/**
 * Split delimited text into rows of fields.
 *
 * A field opening with `"` is quoted and may contain delimiters, newlines and
 * `""` escaped quotes; a quote anywhere else is literal. A field opening with
 * `{` or `[` keeps delimiters nested in its brackets, so unquoted serialized
 * geometry stays in one column. Outside quotes a newline always ends the row.
 * Blank lines are dropped.
 */
export function parseDelimited(text: string, options: DelimitedOptions = {}): string[][] {
  const delimiter = options.delimiter ?? ',';
  const rows: string[][] = [];

  let row: string[] = [];
  let field = '';
  let fieldStarted = false;
  let inQuotes = false;
  let bracketed = false;
  let depth = 0;

  const endField = () => {
    row.push(field);
    field = '';
    fieldStarted = false;
    bracketed = false;
    depth = 0;
  };
  const endRow = () => {
    endField();
    if (row.length > 1 || row[0].trim() !== '') {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (!fieldStarted) {
      fieldStarted = true;
      if (char === '"') {
        inQuotes = true;
        continue;
      }
      bracketed = char === '{' || char === '[';
    }

    if (bracketed && (char === '{' || char === '[')) {
      depth++;
      field += char;
    } else if (bracketed && (char === '}' || char === ']')) {
      depth = Math.max(0, depth - 1);
      field += char;
    } else if (char === delimiter && depth === 0) {
      endField();
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      endRow();
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}
