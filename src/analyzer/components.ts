/**
 * Drafter component kinds and framework names
 */

export const COMPONENTS: readonly string[] = [
  'Argument',
  'Box',
  'BulletedList',
  'Button',
  'CheckBox',
  'Div',
  'Division',
  'Download',
  'FileUpload',
  'Header',
  'HorizontalRule',
  'Image',
  'LineBreak',
  'Link',
  'MatPlotLibPlot',
  'NumberedList',
  'PageContent',
  'Pre',
  'PreformattedText',
  'Row',
  'SelectBox',
  'Span',
  'SubmitButton',
  'Table',
  'Text',
  'TextArea',
  'TextBox',
];

/** Components whose second positional argument is the link target */
export const NAVIGATION_COMPONENTS: readonly string[] = ['Link', 'Button', 'SubmitButton'];

export const RECORD_MARKERS: readonly string[] = ['dataclass'];

export const ROUTE_MARKERS: readonly string[] = ['route'];

/**
 * Framework entry points that are not components but still count as
 * framework usage in body complexity.
 */
export const FRAMEWORK_FUNCTIONS: readonly string[] = [
  'Page',
  'route',
  'start_server',
  'set_website_title',
  'set_website_framed',
  'set_website_style',
  'add_website_css',
  'add_website_header',
  'hide_debug_information',
  'show_debug_information',
  'deploy_site',
  'default_index',
];
