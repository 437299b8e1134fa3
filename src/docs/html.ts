import { DOCS_CDN_ORIGIN } from "../middleware/security";

export type ViewerPageOptions = {
  title: string;
  openApiUrl: string;
};

const SWAGGER_UI_JS = `${DOCS_CDN_ORIGIN}/npm/swagger-ui-dist@5/swagger-ui-bundle.js`;
const SWAGGER_UI_CSS = `${DOCS_CDN_ORIGIN}/npm/swagger-ui-dist@5/swagger-ui.css`;
const REDOC_JS = `${DOCS_CDN_ORIGIN}/npm/redoc@2/bundles/redoc.standalone.js`;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function renderSwaggerUiPage({ title, openApiUrl }: ViewerPageOptions): string {
  return `<!DOCTYPE html>
<html>
<head>
<link type="text/css" rel="stylesheet" href="${SWAGGER_UI_CSS}">
<title>${escapeHtml(`${title} - Swagger UI`)}</title>
</head>
<body>
<div id="swagger-ui"></div>
<script src="${SWAGGER_UI_JS}"></script>
<script>
const ui = SwaggerUIBundle({
  url: ${JSON.stringify(openApiUrl)},
  dom_id: "#swagger-ui",
  layout: "BaseLayout",
  deepLinking: true,
  showExtensions: true,
  showCommonExtensions: true,
  presets: [SwaggerUIBundle.presets.apis, SwaggerUIBundle.SwaggerUIStandalonePreset],
});
</script>
</body>
</html>
`;
}

export function renderRedocPage({ title, openApiUrl }: ViewerPageOptions): string {
  return `<!DOCTYPE html>
<html>
<head>
<title>${escapeHtml(`${title} - ReDoc`)}</title>
<meta charset="utf-8"/>
<meta name="viewport" content="width=device-width, initial-scale=1">
<link href="https://fonts.googleapis.com/css?family=Montserrat:300,400,700|Roboto:300,400,700" rel="stylesheet">
<style>
  body {
    margin: 0;
    padding: 0;
  }
</style>
</head>
<body>
<redoc spec-url="${escapeHtml(openApiUrl)}"></redoc>
<script src="${REDOC_JS}"></script>
</body>
</html>
`;
}
