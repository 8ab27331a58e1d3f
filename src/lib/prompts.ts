// Leading and trailing whitespace is trimmed on render; the inner indentation is sent as-is.
export const README_PROMPT = `
    You are a professional GitHub project assistant. Your task is to generate a comprehensive and well-structured README.md file
    for a new software project. The README should be written in Markdown format and include the following sections:
    1.  A clear and catchy title.
    2.  A brief but engaging description.
    3.  A "Features" section using a bulleted list.
    4.  A "Getting Started" section with instructions for installation and usage.
    5.  A "Contributing" section.
    6.  A "License" section.

    Based on the following project description, please generate the README content.
    
    Project Description: "{description}"
    `;
