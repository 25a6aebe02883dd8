import type { Pagination as PaginationState } from "../../utils/pagination.js";

type PaginationProps = {
  pagination: PaginationState;
  hrefFor: (page: number) => string;
};

export default function Pagination({ pagination, hrefFor }: PaginationProps) {
  if (pagination.pageCount <= 1) {
    return null;
  }

  const pages = Array.from({ length: pagination.pageCount }, (_, index) => index + 1);

  return (
    <nav aria-label="Pagination" className="mt-4">
      <ul className="pagination justify-content-center">
        <li className={pagination.previousPage === null ? "page-item disabled" : "page-item"}>
          {pagination.previousPage === null ? (
            <span className="page-link">Previous</span>
          ) : (
            <a className="page-link" href={hrefFor(pagination.previousPage)} rel="prev">
              Previous
            </a>
          )}
        </li>
        {pages.map((page) => (
          <li key={page} className={page === pagination.page ? "page-item active" : "page-item"}>
            {page === pagination.page ? (
              <span className="page-link" aria-current="page">
                {page}
              </span>
            ) : (
              <a className="page-link" href={hrefFor(page)}>
                {page}
              </a>
            )}
          </li>
        ))}
        <li className={pagination.nextPage === null ? "page-item disabled" : "page-item"}>
          {pagination.nextPage === null ? (
            <span className="page-link">Next</span>
          ) : (
            <a className="page-link" href={hrefFor(pagination.nextPage)} rel="next">
              Next
            </a>
          )}
        </li>
      </ul>
    </nav>
  );
}
