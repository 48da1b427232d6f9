/** Content-Type header sent by the HTTP transport. */
export function contentTypeFor(contentIsJson: boolean): string {
  return `application/${contentIsJson ? "json" : "xml"};charset=UTF-8`;
}
